export {
  BOARD_SIZE,
  EMPTY,
  cellOf,
  opponentOf,
  inBounds,
  emptyBoard,
  cloneBoard,
  resetBoard,
  countPieces,
  recomputeScores,
  boardTerminalReason,
  isGameOver,
  terminalReason,
} from "./state";
export type { Board, CellState, GameState, Player, TerminalReason } from "./state";
export { getFlips, attemptMove, advanceTurn, toggleTurn, getOutcome } from "./rules";
export {
  DEFAULT_POLICY,
  initialize,
  handleCellClick,
  handleResetSignal,
  handlePassSignal,
  readCell,
  readScores,
  dispatchAction,
  isPlaceAction,
  isPassAction,
  isResetAction,
} from "./actions";
export type { GamePolicy, PlaceAction, PassAction, ResetAction, ReversiAction } from "./actions";
export { GAME_ID, getObservation, isBoard } from "./observation";
export type { ReversiPublicData } from "./observation";
export { ReversiUI } from "./ui";
