import { strict as assert } from "assert";
import bunyan from "bunyan";
import { emptyBoard, GameState } from "@reversi/game-reversi";
import { GameSession } from "./session.js";

function capture() {
  const ring = new bunyan.RingBuffer({ limit: 100 });
  const logger = bunyan.createLogger({
    name: "reversi-test",
    streams: [{ type: "raw", stream: ring, level: "trace" }],
  });
  const messages = () => ring.records.map((r: { msg: string }) => r.msg);
  return { ring, logger, messages };
}

function nearlyWonState(): GameState {
  const board = emptyBoard();
  board[0][0] = "W";
  board[0][1] = "B";
  return { board, activePlayer: "first", scores: { first: 1, second: 1 } };
}

describe("GameSession", () => {
  it("should start from the opening position", () => {
    const { logger } = capture();
    const session = new GameSession({ logger });

    assert.deepEqual(session.readScores(), [2, 2]);
    assert.equal(session.activePlayer, "first");
    assert.equal(session.readCell(3, 3), "W");
    assert.equal(session.isGameOver(), false);
  });

  it("should play a legal click and log it", () => {
    const { logger, ring } = capture();
    const session = new GameSession({ logger });

    assert.deepEqual(session.click(2, 4), { accepted: true, gameOver: false });
    assert.equal(session.activePlayer, "second");
    assert.deepEqual(session.readScores(), [4, 1]);

    const last = ring.records[ring.records.length - 1];
    assert.equal(last.msg, "Move played");
    assert.equal(last.move, "e3");
    assert.equal(last.player, "White");
  });

  it("should log rejected clicks without changing the game", () => {
    const { logger, ring } = capture();
    const session = new GameSession({ logger });

    assert.deepEqual(session.click(2, 3), { accepted: false, gameOver: false });
    assert.equal(session.activePlayer, "first");

    const last = ring.records[ring.records.length - 1];
    assert.equal(last.msg, "Input rejected");
    assert.equal(last.action, "d3");
  });

  it("should pass the turn", () => {
    const { logger, messages } = capture();
    const session = new GameSession({ logger });

    session.pass();

    assert.equal(session.activePlayer, "second");
    assert.deepEqual(messages(), ["Turn passed"]);
  });

  it("should announce game over once per transition", () => {
    const { logger, ring, messages } = capture();
    const session = new GameSession({ logger, state: nearlyWonState() });

    assert.deepEqual(session.click(0, 2), { accepted: true, gameOver: true });
    session.pass();
    session.pass();

    assert.deepEqual(messages(), ["Move played", "Game Over", "Turn passed", "Turn passed"]);
    const over = ring.records[1];
    assert.equal(over.first, 3);
    assert.equal(over.second, 0);
    assert.equal(over.outcome.winner, "first");
    assert.equal(over.outcome.reason, "second_eliminated");

    session.reset();
    assert.equal(session.isGameOver(), false);
    assert.equal(messages()[4], "New game");
  });

  it("should refuse input after game over when frozen", () => {
    const { logger, ring } = capture();
    const session = new GameSession({
      logger,
      policy: { freezeOnGameOver: true },
      state: nearlyWonState(),
    });

    session.click(0, 2);
    assert.deepEqual(session.pass(), { accepted: false, gameOver: true });
    assert.equal(session.activePlayer, "second");

    const last = ring.records[ring.records.length - 1];
    assert.equal(last.msg, "Input rejected");
    assert.equal(last.action, "pass");

    assert.deepEqual(session.reset(), { accepted: true, gameOver: false });
    assert.deepEqual(session.readScores(), [2, 2]);
  });

  it("should expose the current observation", () => {
    const { logger } = capture();
    const session = new GameSession({ logger });

    const obs = session.getObservation();
    assert.equal(obs.currentPlayer, "first");
    assert.equal(obs.publicData.gameOver, false);
  });
});
