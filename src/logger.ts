import pino from "pino";
import { Config } from "./config/types";

export type Logger = pino.Logger;

export function createLogger(observability: Config["observability"]): Logger {
  return pino({
    level: observability.logLevel,
    transport: observability.logHuman
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Flushes buffered log lines before exiting, so a fatal line written just
 * ahead of the exit is not lost.
 */
export function flushAndExit(
  logger: Logger,
  code: number,
  exit: (code: number) => void = (status) => process.exit(status)
): void {
  logger.flush(() => exit(code));
}
