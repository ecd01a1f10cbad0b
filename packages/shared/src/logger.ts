import pino, { type Logger } from "pino";
import { resolveLogLevel, variables, type LogLevel } from "./environment";

const destination = pino.destination({ dest: 2, sync: true });

let levelOverride: LogLevel | null = null;
const loggers = new Set<Logger>();

/**
 * Named pino logger writing to stderr, so stdout stays free for reports.
 */
export function createLogger(name: string): Logger {
  const logger = pino(
    { name, level: levelOverride ?? resolveLogLevel(variables()) },
    destination,
  );
  loggers.add(logger);
  return logger;
}

/** Changes the level of every logger created so far and of later ones. */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of loggers) logger.level = level;
}
