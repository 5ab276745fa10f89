import type { Action, GameUISpec, RenderOptions } from "@reversi/core";
import { BOARD_SIZE, CellState, boardTerminalReason, countPieces } from "./state";
import { isPassAction, isPlaceAction, isResetAction } from "./actions";
import { isBoard } from "./observation";

const COL_LETTERS = "abcdefgh";

interface GridGlyphs {
  top: string;
  separator: string;
  bottom: string;
  vertical: string;
  first: string;
  second: string;
}

const UNICODE_GLYPHS: GridGlyphs = {
  top: "  ┌" + "───┬".repeat(BOARD_SIZE - 1) + "───┐",
  separator: "  ├" + "───┼".repeat(BOARD_SIZE - 1) + "───┤",
  bottom: "  └" + "───┴".repeat(BOARD_SIZE - 1) + "───┘",
  vertical: "│",
  first: "○",
  second: "●",
};

const ASCII_RULE = "  +" + "---+".repeat(BOARD_SIZE);

const ASCII_GLYPHS: GridGlyphs = {
  top: ASCII_RULE,
  separator: ASCII_RULE,
  bottom: ASCII_RULE,
  vertical: "|",
  first: "W",
  second: "B",
};

function renderCell(value: CellState, glyphs: GridGlyphs, selected: boolean): string {
  let piece = ".";
  if (value === "W") {
    piece = `<span class="rv-w">${glyphs.first}</span>`;
  } else if (value === "B") {
    piece = `<span class="rv-b">${glyphs.second}</span>`;
  }
  return selected ? `[${piece}]` : ` ${piece} `;
}

export const ReversiUI: GameUISpec = {
  playerLabels: ["White", "Black"],

  pieces: {
    W: { symbol: "○", label: "W" },
    B: { symbol: "●", label: "B" },
  },

  inputHint: "Enter position (e.g. d3), pass or reset",

  maxTurns: 60,

  renderBoard(publicData: Record<string, unknown>, options: RenderOptions = {}): string {
    const board = publicData.board;
    if (!isBoard(board)) return "Waiting for game state...";

    const glyphs = options.style === "ascii" ? ASCII_GLYPHS : UNICODE_GLYPHS;
    const cursor = options.cursor;
    const lines: string[] = [];

    // Column header
    lines.push("    " + COL_LETTERS.split("").join("   "));
    lines.push(glyphs.top);

    for (let r = 0; r < BOARD_SIZE; r++) {
      const cells: string[] = [];
      for (let c = 0; c < BOARD_SIZE; c++) {
        const selected = cursor !== undefined && cursor.row === r && cursor.col === c;
        cells.push(renderCell(board[r][c], glyphs, selected));
      }
      lines.push(`${r + 1} ${glyphs.vertical}${cells.join(glyphs.vertical)}${glyphs.vertical}`);

      if (r < BOARD_SIZE - 1) {
        lines.push(glyphs.separator);
      }
    }

    lines.push(glyphs.bottom);

    return lines.join("\n");
  },

  renderStatus(publicData: Record<string, unknown>): string | null {
    const board = publicData.board;
    if (!isBoard(board)) return null;

    const pieces = countPieces(board);
    const status = `White: ${pieces.first}  Black: ${pieces.second}`;
    return boardTerminalReason(board) !== null ? `${status}  Game Over` : status;
  },

  parseInput(raw: string): Action | null {
    const trimmed = raw.trim().toLowerCase();

    if (trimmed === "pass" || trimmed === "s") {
      return { type: "pass", data: {} };
    }

    if (trimmed === "reset" || trimmed === "new") {
      return { type: "reset", data: {} };
    }

    // Parse coordinate like "d3" → col 3, row 2
    if (trimmed.length === 2) {
      const col = COL_LETTERS.indexOf(trimmed[0]);
      const row = parseInt(trimmed[1], 10) - 1;

      if (col >= 0 && row >= 0 && row < BOARD_SIZE) {
        return { type: "place", data: { row, col } };
      }
    }

    return null;
  },

  formatAction(action: Action): string {
    if (isPlaceAction(action)) {
      const colLetter = COL_LETTERS[action.data.col] ?? "?";
      return `${colLetter}${action.data.row + 1}`;
    }
    if (isPassAction(action)) return "pass";
    if (isResetAction(action)) return "reset";
    return action.type;
  },

  getPlayerLabel(side: string): string {
    if (side === "first" || side === "W") return "White";
    if (side === "second" || side === "B") return "Black";
    return "?";
  },
};
