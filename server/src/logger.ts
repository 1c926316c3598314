import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = "info"): Logger {
  return pino({
    name: "word-chain",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
