import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import React from "react";
import { render } from "ink";
import { ReversiUI, getObservation, initialize } from "@reversi/game-reversi";
import { App } from "./tui/App.js";
import { GameSession } from "./session.js";
import { createLogger } from "./logger.js";
import { resolveConfig, setCliOverride, parseSettings, Settings } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";

const VERSION = "0.1.0";

async function loadSettings(): Promise<Settings> {
  try {
    return parseSettings(await resolveConfig());
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

program
  .name("reversi")
  .description("Reversi (Othello) in the terminal")
  .version(VERSION, "-v, --version");

registerConfigCommand(program);

program
  .command("play")
  .description("Start an interactive two-player game")
  .option("--ascii", "Draw the board with plain ASCII characters")
  .option("--freeze", "Stop accepting moves once the game is over")
  .option("--log-level <level>", "bunyan log level (written to stderr)")
  .action(async (opts: { ascii?: boolean; freeze?: boolean; logLevel?: string }) => {
    if (opts.ascii) setCliOverride("boardStyle", "ascii");
    if (opts.freeze) setCliOverride("freezeOnGameOver", "true");
    if (opts.logLevel) setCliOverride("logLevel", opts.logLevel);

    const settings = await loadSettings();
    const logger = createLogger(settings.logLevel);
    const session = new GameSession({
      logger,
      policy: { freezeOnGameOver: settings.freezeOnGameOver },
    });

    logger.info({ settings }, "Starting game");
    const instance = render(React.createElement(App, { session, settings, version: VERSION }));
    await instance.waitUntilExit();
  });

program
  .command("show")
  .description("Print the opening position and exit")
  .option("--ascii", "Draw the board with plain ASCII characters")
  .action(async (opts: { ascii?: boolean }) => {
    if (opts.ascii) setCliOverride("boardStyle", "ascii");
    const settings = await loadSettings();
    const { publicData } = getObservation(initialize());

    console.log("");
    console.log(
      ReversiUI.renderBoard(publicData, { style: settings.boardStyle })
        .replace(/<span class="[^"]*">(.*?)<\/span>/g, "$1"),
    );
    console.log("");
    console.log(ReversiUI.renderStatus(publicData) ?? "");
  });

await program.parseAsync(process.argv);
