import type { Action, Coord } from "@reversi/core";
import { BOARD_SIZE, ReversiUI } from "@reversi/game-reversi";

/** The subset of ink's `Key` the board screen reacts to */
export interface KeyFlags {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  return: boolean;
  escape: boolean;
  backspace: boolean;
  delete: boolean;
  ctrl: boolean;
  meta: boolean;
}

export type BoardCommand =
  | { type: "cursor"; dr: number; dc: number }
  | { type: "submit" }
  | { type: "reset" }
  | { type: "pass" }
  | { type: "quit" }
  | { type: "clear" }
  | { type: "backspace" }
  | { type: "type"; text: string }
  | { type: "none" };

/**
 * Translate one keypress into a board command. Space starts a new game and
 * "s" skips the turn, as long as no coordinate is being typed.
 */
export function keyToCommand(input: string, key: KeyFlags, buffer: string): BoardCommand {
  if (key.upArrow) return { type: "cursor", dr: -1, dc: 0 };
  if (key.downArrow) return { type: "cursor", dr: 1, dc: 0 };
  if (key.leftArrow) return { type: "cursor", dr: 0, dc: -1 };
  if (key.rightArrow) return { type: "cursor", dr: 0, dc: 1 };
  if (key.return) return { type: "submit" };
  if (key.escape) return { type: "clear" };
  if (key.backspace || key.delete) return { type: "backspace" };
  if (!input || key.ctrl || key.meta) return { type: "none" };

  if (buffer === "") {
    if (input === " ") return { type: "reset" };
    if (input === "s" || input === "S") return { type: "pass" };
    if (input === "q" || input === "Q") return { type: "quit" };
  }
  return { type: "type", text: input };
}

/** Move the cursor, stopping at the board edge */
export function moveCursor(cursor: Coord, dr: number, dc: number): Coord {
  const clamp = (v: number) => Math.min(BOARD_SIZE - 1, Math.max(0, v));
  return { row: clamp(cursor.row + dr), col: clamp(cursor.col + dc) };
}

/** A typed coordinate wins over the cursor; null means the typed text is not a command */
export function resolveSubmit(buffer: string, cursor: Coord): Action | null {
  if (buffer.trim() === "") {
    return { type: "place", data: { row: cursor.row, col: cursor.col } };
  }
  return ReversiUI.parseInput(buffer);
}
