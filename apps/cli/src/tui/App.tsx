import React from "react";
import { Box, useApp } from "ink";
import { StatusBar } from "./components/StatusBar.js";
import { GameBoard } from "./screens/GameBoard.js";
import type { Settings } from "../config/index.js";
import type { GameSession } from "../session.js";

interface AppProps {
  session: GameSession;
  settings: Settings;
  version: string;
}

export function App({ session, settings, version }: AppProps) {
  const { exit } = useApp();

  return (
    <Box flexDirection="column">
      <StatusBar version={version} freezeOnGameOver={settings.freezeOnGameOver} />
      <GameBoard session={session} boardStyle={settings.boardStyle} onQuit={() => exit()} />
    </Box>
  );
}
