import React, { useCallback, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { Coord, Observation } from "@reversi/core";
import { ReversiUI } from "@reversi/game-reversi";
import type { BoardStyle } from "../../config/index.js";
import type { GameSession } from "../../session.js";
import { colors } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { PlayerInfo } from "../components/PlayerInfo.js";
import { keyToCommand, moveCursor, resolveSubmit } from "../input.js";

interface GameBoardProps {
  session: GameSession;
  boardStyle: BoardStyle;
  onQuit: () => void;
}

export function GameBoard({ session, boardStyle, onQuit }: GameBoardProps) {
  const [observation, setObservation] = useState<Observation>(() => session.getObservation());
  const [cursor, setCursor] = useState<Coord>({ row: 2, col: 3 });
  const [inputBuffer, setInputBuffer] = useState("");
  const [error, setError] = useState("");

  const refresh = useCallback(() => {
    setObservation(session.getObservation());
  }, [session]);

  const handleSubmit = useCallback(() => {
    const action = resolveSubmit(inputBuffer, cursor);
    setInputBuffer("");
    if (!action) {
      setError("Invalid input. " + ReversiUI.inputHint);
      return;
    }
    const result = session.submit(action);
    setError(result.accepted ? "" : `Cannot play ${ReversiUI.formatAction(action)}`);
    refresh();
  }, [inputBuffer, cursor, session, refresh]);

  useInput((input, key) => {
    const command = keyToCommand(input, key, inputBuffer);

    switch (command.type) {
      case "cursor": {
        const { dr, dc } = command;
        setCursor((prev) => moveCursor(prev, dr, dc));
        return;
      }
      case "submit":
        handleSubmit();
        return;
      case "reset":
        session.reset();
        setError("");
        refresh();
        return;
      case "pass":
        if (!session.pass().accepted) setError("Cannot pass");
        refresh();
        return;
      case "quit":
        onQuit();
        return;
      case "clear":
        setInputBuffer("");
        setError("");
        return;
      case "backspace":
        setInputBuffer((prev) => prev.slice(0, -1));
        return;
      case "type": {
        const { text } = command;
        setInputBuffer((prev) => prev + text);
        if (error) setError("");
        return;
      }
      case "none":
        return;
    }
  });

  const [firstScore, secondScore] = session.readScores();
  const gameOver = observation.publicData.gameOver === true;
  const boardHtml = ReversiUI.renderBoard(observation.publicData, {
    cursor,
    style: boardStyle,
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Box flexDirection="column" marginBottom={1}>
        <PlayerInfo
          label={ReversiUI.playerLabels[0]}
          score={firstScore}
          playerIndex={0}
          isCurrentTurn={observation.currentPlayer === "first"}
        />
        <PlayerInfo
          label={ReversiUI.playerLabels[1]}
          score={secondScore}
          playerIndex={1}
          isCurrentTurn={observation.currentPlayer === "second"}
        />
      </Box>

      <ColoredBoard html={boardHtml} />

      <Text>{""}</Text>
      {gameOver ? (
        <Text color={colors.primary} bold>
          {ReversiUI.renderStatus(observation.publicData)}
        </Text>
      ) : (
        <Text color={colors.text}>
          {ReversiUI.getPlayerLabel(observation.currentPlayer)} to move
        </Text>
      )}

      <Box>
        <Text color={colors.white}>{"> "}</Text>
        <Text color={colors.white}>{inputBuffer}</Text>
        <Text color={colors.dimmed}>_</Text>
      </Box>
      {error && <Text color={colors.error}>{error}</Text>}

      <Text color={colors.dimmed}>
        [Arrows] Move  [Enter] Place  [S] Pass  [Space] New game  [Q] Quit
      </Text>
    </Box>
  );
}
