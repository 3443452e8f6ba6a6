import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.VITEST ? "silent" : "info";
}

// stdout is left to the build pipeline; diagnostics go to stderr
export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino(
    {
      level: options.level ?? defaultLevel(),
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );

const logger = createLogger();

export default logger;
