import type { Observation, Outcome } from "@reversi/core";
import { Board, CellState, GameState, Player, cloneBoard, isGameOver } from "./state";
import { getOutcome } from "./rules";

export const GAME_ID = "reversi";

/** Render-facing copy of the state. Mutating it never reaches the game. */
export type ReversiPublicData = {
  board: Board;
  activePlayer: Player;
  scores: Record<Player, number>;
  gameOver: boolean;
  outcome: Outcome;
};

/**
 * Reversi is a perfect information game, so the observation
 * is the full state.
 */
export function getObservation(state: GameState): Observation {
  const publicData: ReversiPublicData = {
    board: cloneBoard(state.board),
    activePlayer: state.activePlayer,
    scores: { ...state.scores },
    gameOver: isGameOver(state),
    outcome: getOutcome(state),
  };

  return {
    gameId: GAME_ID,
    currentPlayer: state.activePlayer,
    publicData,
  };
}

function isCellState(value: unknown): value is CellState {
  return value === "W" || value === "B" || value === "";
}

/** Narrow an untyped publicData board back to a Board */
export function isBoard(value: unknown): value is Board {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every(isCellState))
  );
}
