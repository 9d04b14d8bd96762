import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(level: string): Logger {
  return pino({ level, base: { service: "meeting-bridge" } });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
