/** Zero-based board coordinate. Orientation is owned by the renderer. */
export interface Coord {
  row: number;
  col: number;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  /** Label of the winning side, or null on a draw or an unfinished game */
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

/** Read-only snapshot handed to rendering collaborators */
export interface Observation {
  gameId: string;
  currentPlayer: string;
  publicData: Record<string, unknown>;
}

/** Outcome of feeding one input event through a game's handler chain */
export interface StepResult {
  /** False when the input was rejected and the state left untouched */
  accepted: boolean;
  gameOver: boolean;
}
