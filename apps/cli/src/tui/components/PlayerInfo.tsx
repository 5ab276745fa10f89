import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface PlayerInfoProps {
  label: string;
  score: number;
  playerIndex: number;
  isCurrentTurn: boolean;
}

export function PlayerInfo({ label, score, playerIndex, isCurrentTurn }: PlayerInfoProps) {
  const labelColor = playerIndex === 0 ? colors.white : colors.secondary;

  return (
    <Box flexDirection="row" gap={1}>
      <Text color={labelColor} bold>
        [{label}]
      </Text>
      <Text color={isCurrentTurn ? colors.primary : colors.dimmed}>
        {score}
        {isCurrentTurn ? " ◀" : ""}
      </Text>
    </Box>
  );
}
