import type { Action } from "./game";

// ---------------------------------------------------------------------------
// Game UI specification: shipped by a game module for rendering
// ---------------------------------------------------------------------------

export interface PieceDisplay {
  /** Unicode or ASCII character (e.g. "●", "O") */
  symbol: string;
  /** Short text label (e.g. "W", "B") */
  label: string;
}

/**
 * UI specification that a game module provides so that front ends can render
 * it generically without hardcoded per-game logic.
 */
export interface GameUISpec {
  /** Player role labels in turn order (e.g. ["White", "Black"]) */
  playerLabels: string[];

  /** Map of piece identifiers to display info */
  pieces: Record<string, PieceDisplay>;

  /** Hint text shown to the current player (e.g. "Enter position (e.g. d3)") */
  inputHint: string;

  /** Max possible placements, or null if unbounded. */
  maxTurns: number | null;

  /**
   * Render the board from publicData. Pieces are wrapped in
   * `<span class="...">` tags so terminal and web front ends can colour them.
   */
  renderBoard(publicData: Record<string, unknown>, options?: RenderOptions): string;

  /** Render a one-line status string, or null if there is nothing to show. */
  renderStatus(publicData: Record<string, unknown>): string | null;

  /** Parse raw user input into an Action, or return null if invalid. */
  parseInput(raw: string): Action | null;

  /** Format an Action as a human-readable string (e.g. "d3"). */
  formatAction(action: Action): string;

  /** Display label for a side given its identifier in publicData. */
  getPlayerLabel(side: string): string;
}

export interface RenderOptions {
  /** Highlight this cell (keyboard cursor) */
  cursor?: { row: number; col: number };
  /** "unicode" draws box characters and discs, "ascii" sticks to 7-bit */
  style?: "unicode" | "ascii";
}
