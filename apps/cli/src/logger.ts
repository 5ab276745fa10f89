import bunyan from "bunyan";

/**
 * Logs go to stderr: stdout belongs to the board.
 */
export function createLogger(level: bunyan.LogLevelString): bunyan {
  return bunyan.createLogger({
    name: "reversi-cli",
    level,
    stream: process.stderr,
  });
}
