/** Cell values: "W" (White, first player), "B" (Black, second player), or "" (empty) */
export type CellState = "W" | "B" | "";

/** The two sides. Never empty; mapped onto cells by {@link cellOf}. */
export type Player = "first" | "second";

/** 8x8 board represented as a 2D array */
export type Board = CellState[][];

/** Board dimension */
export const BOARD_SIZE = 8;

export const EMPTY: CellState = "";

/** The single mutable aggregate: board, turn indicator and derived scores */
export interface GameState {
  board: Board;
  activePlayer: Player;
  /** Piece counts per player, recomputable from the board at any time */
  scores: Record<Player, number>;
}

/** Why a game ended, or null while it is still running */
export type TerminalReason = "board_full" | "first_eliminated" | "second_eliminated";

/** All 8 directions for flipping */
export const ALL_DIRECTIONS: readonly (readonly [number, number])[] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1],
];

export function cellOf(player: Player): CellState {
  return player === "first" ? "W" : "B";
}

export function opponentOf(player: Player): Player {
  return player === "first" ? "second" : "first";
}

export function inBounds(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  );
}

/** Create an empty 8x8 board */
export function emptyBoard(): Board {
  const board: Board = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    board.push(new Array<CellState>(BOARD_SIZE).fill(EMPTY));
  }
  return board;
}

/** Deep-clone a board */
export function cloneBoard(board: Board): Board {
  return board.map((r) => [...r]);
}

/**
 * Put the state back to the standard opening: every cell empty, then the
 * first player on the main diagonal of the centre block and the second
 * player on the anti-diagonal. Scores are 2/2 and the first player moves.
 */
export function resetBoard(state: GameState): void {
  for (const row of state.board) {
    row.fill(EMPTY);
  }
  state.scores.first = 2;
  state.scores.second = 2;
  state.activePlayer = "first";
  state.board[3][3] = cellOf("first");
  state.board[4][4] = cellOf("first");
  state.board[3][4] = cellOf("second");
  state.board[4][3] = cellOf("second");
}

/** Count cells of each kind on the board */
export function countPieces(board: Board): { first: number; second: number; empty: number } {
  let first = 0;
  let second = 0;
  let empty = 0;
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const cell = board[r][c];
      if (cell === "W") first++;
      else if (cell === "B") second++;
      else empty++;
    }
  }
  return { first, second, empty };
}

/** Overwrite both score fields from a fresh scan of the board */
export function recomputeScores(state: GameState): void {
  const pieces = countPieces(state.board);
  state.scores.first = pieces.first;
  state.scores.second = pieces.second;
}

/** Why the position on this board is final, or null while play continues */
export function boardTerminalReason(board: Board): TerminalReason | null {
  const pieces = countPieces(board);
  if (pieces.first === 0) return "first_eliminated";
  if (pieces.second === 0) return "second_eliminated";
  if (pieces.empty === 0) return "board_full";
  return null;
}

export function terminalReason(state: GameState): TerminalReason | null {
  return boardTerminalReason(state.board);
}

/**
 * The game is over once either colour has vanished from the board or no
 * empty cell is left. Purely observational: nothing is frozen here.
 */
export function isGameOver(state: GameState): boolean {
  return terminalReason(state) !== null;
}
