import pino from "pino";
import config from "./config.js";

export type Logger = pino.Logger;

// Diagnostics go to stderr so stdout only carries the confirmation line.
export const rootLogger: Logger = pino.pino(
  { level: config.LOG_LEVEL },
  pino.destination(2),
);

export function getLogger(module: string): Logger {
  return rootLogger.child({ module });
}
