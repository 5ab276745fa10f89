import type Logger from "bunyan";
import type { Action, Observation, StepResult } from "@reversi/core";
import {
  CellState,
  DEFAULT_POLICY,
  GamePolicy,
  GameState,
  Player,
  ReversiUI,
  dispatchAction,
  getObservation,
  getOutcome,
  initialize,
  isGameOver,
  isPassAction,
  isPlaceAction,
  isResetAction,
  readCell,
  readScores,
} from "@reversi/game-reversi";

export interface GameSessionOptions {
  logger: Logger;
  policy?: GamePolicy;
  /** Start from this state instead of the opening position */
  state?: GameState;
}

/**
 * Owns the single game state for the lifetime of the front end and feeds
 * every input through the rules in order. Announces game over once per
 * transition, not on every later input.
 */
export class GameSession {
  private readonly state: GameState;
  private readonly policy: GamePolicy;
  private readonly log: Logger;
  private over = false;

  constructor(opts: GameSessionOptions) {
    this.log = opts.logger;
    this.policy = opts.policy ?? DEFAULT_POLICY;
    this.state = opts.state ?? initialize();
    this.over = isGameOver(this.state);
  }

  get activePlayer(): Player {
    return this.state.activePlayer;
  }

  isGameOver(): boolean {
    return isGameOver(this.state);
  }

  readCell(row: number, col: number): CellState {
    return readCell(this.state, row, col);
  }

  readScores(): [number, number] {
    return readScores(this.state);
  }

  getObservation(): Observation {
    return getObservation(this.state);
  }

  click(row: number, col: number): StepResult {
    return this.submit({ type: "place", data: { row, col } });
  }

  pass(): StepResult {
    return this.submit({ type: "pass", data: {} });
  }

  reset(): StepResult {
    return this.submit({ type: "reset", data: {} });
  }

  submit(action: Action): StepResult {
    const player = this.state.activePlayer;
    const result = dispatchAction(this.state, action, this.policy);
    const label = ReversiUI.getPlayerLabel(player);

    if (isResetAction(action)) {
      this.log.info("New game");
    } else if (!result.accepted) {
      this.log.debug({ action: ReversiUI.formatAction(action), player: label }, "Input rejected");
    } else if (isPlaceAction(action)) {
      this.log.debug({ move: ReversiUI.formatAction(action), player: label }, "Move played");
    } else if (isPassAction(action)) {
      this.log.debug({ player: label }, "Turn passed");
    }

    if (result.gameOver && !this.over) {
      const [first, second] = readScores(this.state);
      this.log.info({ first, second, outcome: getOutcome(this.state) }, "Game Over");
    }
    this.over = result.gameOver;

    return result;
  }
}
