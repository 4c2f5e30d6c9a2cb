import pino, { type Logger } from "pino";

export type { Logger };

/** `toStderr` keeps stdout free for interactive output. */
export function createLogger(verbose = false, toStderr = false): Logger {
  const options = {
    level: verbose ? "debug" : process.env.LOG_LEVEL ?? "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return toStderr ? pino(options, pino.destination(2)) : pino(options);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
