import type { Coord, Outcome } from "@reversi/core";
import {
  ALL_DIRECTIONS,
  Board,
  GameState,
  Player,
  cellOf,
  countPieces,
  inBounds,
  opponentOf,
  terminalReason,
} from "./state";

/**
 * Get all opponent pieces that would be flipped by `player` placing at (row, col).
 * Returns an empty array if the cell is occupied, off the board, or no ray
 * ends in one of the player's own pieces.
 */
export function getFlips(
  board: Board,
  row: number,
  col: number,
  player: Player
): Coord[] {
  if (!inBounds(row, col) || board[row][col] !== "") return [];
  const current = cellOf(player);
  const opponent = cellOf(opponentOf(player));
  const allFlips: Coord[] = [];
  for (const [dr, dc] of ALL_DIRECTIONS) {
    const lineFlips: Coord[] = [];
    let r = row + dr,
      c = col + dc;
    while (inBounds(r, c) && board[r][c] === opponent) {
      lineFlips.push({ row: r, col: c });
      r += dr;
      c += dc;
    }
    // An empty run means the first neighbour was not an opponent piece
    if (lineFlips.length > 0 && inBounds(r, c) && board[r][c] === current) {
      allFlips.push(...lineFlips);
    }
  }
  return allFlips;
}

/**
 * Place the active player's piece at `target` and flip every sandwiched run.
 * Returns false and leaves the board untouched when the move is illegal.
 * The turn is not advanced here.
 */
export function attemptMove(state: GameState, target: Coord): boolean {
  const flips = getFlips(state.board, target.row, target.col, state.activePlayer);
  if (flips.length === 0) {
    return false;
  }

  const current = cellOf(state.activePlayer);
  for (const flip of flips) {
    state.board[flip.row][flip.col] = current;
  }
  state.board[target.row][target.col] = current;
  return true;
}

/** Hand the turn to the other player after an accepted move */
export function advanceTurn(state: GameState): void {
  state.activePlayer = opponentOf(state.activePlayer);
}

/** Manual skip. Same effect as {@link advanceTurn}, separate trigger. */
export function toggleTurn(state: GameState): void {
  state.activePlayer = opponentOf(state.activePlayer);
}

export function getOutcome(state: GameState): Outcome {
  const reason = terminalReason(state);
  const pieces = countPieces(state.board);
  const scores = { first: pieces.first, second: pieces.second };

  if (reason === null) {
    return { winner: null, draw: false, scores, reason: "game_in_progress" };
  }

  if (pieces.first === pieces.second) {
    return { winner: null, draw: true, scores, reason };
  }

  const winner: Player = pieces.first > pieces.second ? "first" : "second";
  return { winner, draw: false, scores, reason };
}
