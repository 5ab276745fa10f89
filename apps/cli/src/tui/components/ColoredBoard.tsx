import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

/**
 * Maps CSS classes from ReversiUI.renderBoard() output to terminal colors.
 */
const CLASS_STYLES: Record<string, { color?: string; bold?: boolean }> = {
  "rv-w": { color: colors.white, bold: true },
  "rv-b": { color: colors.secondary, bold: true },
};

export interface Segment {
  text: string;
  color?: string;
  bold?: boolean;
}

export function parseSegments(line: string): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ text: line.slice(lastIndex, match.index) });
    }

    let color: string | undefined;
    let bold: boolean | undefined;

    for (const cls of match[1].split(/\s+/)) {
      const style = CLASS_STYLES[cls];
      if (style) {
        if (style.color) color = style.color;
        if (style.bold) bold = true;
      }
    }

    segments.push({ text: match[2], color, bold });
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ text: line.slice(lastIndex) });
  }

  return segments;
}

/**
 * Renders board markup (with <span class="..."> tags) as colored Ink text.
 */
export function ColoredBoard({ html }: { html: string }) {
  const lines = html.split("\n");

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i}>
          {parseSegments(line).map((seg, j) => (
            <Text key={j} color={seg.color} bold={seg.bold}>
              {seg.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
