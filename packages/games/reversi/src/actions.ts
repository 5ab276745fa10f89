import type { Action, StepResult } from "@reversi/core";
import {
  CellState,
  EMPTY,
  GameState,
  emptyBoard,
  inBounds,
  isGameOver,
  recomputeScores,
  resetBoard,
} from "./state";
import { advanceTurn, attemptMove, toggleTurn } from "./rules";

/** A Reversi action: place a piece at (row, col), i.e. a resolved click */
export interface PlaceAction extends Action {
  type: "place";
  data: { row: number; col: number };
}

/** A Reversi action: hand the turn over without placing */
export interface PassAction extends Action {
  type: "pass";
  data: Record<string, never>;
}

/** A Reversi action: start a new game */
export interface ResetAction extends Action {
  type: "reset";
  data: Record<string, never>;
}

export type ReversiAction = PlaceAction | PassAction | ResetAction;

export interface GamePolicy {
  /** Ignore placements and passes once the game is over (reset still works) */
  freezeOnGameOver: boolean;
}

export const DEFAULT_POLICY: GamePolicy = { freezeOnGameOver: false };

export function isPlaceAction(action: Action): action is PlaceAction {
  return (
    action.type === "place" &&
    typeof action.data.row === "number" &&
    typeof action.data.col === "number"
  );
}

export function isPassAction(action: Action): action is PassAction {
  return action.type === "pass";
}

export function isResetAction(action: Action): action is ResetAction {
  return action.type === "reset";
}

/** Create the process-wide state in the opening position */
export function initialize(): GameState {
  const state: GameState = {
    board: emptyBoard(),
    activePlayer: "first",
    scores: { first: 0, second: 0 },
  };
  resetBoard(state);
  recomputeScores(state);
  return state;
}

/**
 * A click resolved to a board cell. Runs the move, then the turn change
 * (only if the move was accepted), the score recount and the game-over check.
 * Coordinates off the board are rejected like any other illegal move.
 */
export function handleCellClick(state: GameState, row: number, col: number): StepResult {
  const accepted = inBounds(row, col) && attemptMove(state, { row, col });
  if (accepted) {
    advanceTurn(state);
  }
  recomputeScores(state);
  return { accepted, gameOver: isGameOver(state) };
}

export function handleResetSignal(state: GameState): void {
  resetBoard(state);
  recomputeScores(state);
}

export function handlePassSignal(state: GameState): void {
  toggleTurn(state);
}

/** Cell lookup for renderers. Off-board coordinates read as empty. */
export function readCell(state: GameState, row: number, col: number): CellState {
  if (!inBounds(row, col)) return EMPTY;
  return state.board[row][col];
}

/** Scores as [first, second] */
export function readScores(state: GameState): [number, number] {
  return [state.scores.first, state.scores.second];
}

/**
 * Route an untyped input action through its handler chain.
 * Unknown or malformed actions are rejected without touching the state.
 */
export function dispatchAction(
  state: GameState,
  action: Action,
  policy: GamePolicy = DEFAULT_POLICY
): StepResult {
  if (isResetAction(action)) {
    handleResetSignal(state);
    return { accepted: true, gameOver: isGameOver(state) };
  }

  if (policy.freezeOnGameOver && isGameOver(state)) {
    return { accepted: false, gameOver: true };
  }

  if (isPlaceAction(action)) {
    return handleCellClick(state, action.data.row, action.data.col);
  }

  if (isPassAction(action)) {
    handlePassSignal(state);
    return { accepted: true, gameOver: isGameOver(state) };
  }

  return { accepted: false, gameOver: isGameOver(state) };
}
