import { pino, destination, type Logger } from "pino";
import { loadConfig } from "./config.js";

// stdout carries the MCP stdio transport, so logs go to stderr
export const logger = pino(
  {
    level: loadConfig().logLevel,
    base: {
      pid: undefined,
      hostname: undefined,
    },
  },
  destination(2),
);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
