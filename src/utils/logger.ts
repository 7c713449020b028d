import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level = "info", name?: string): Logger {
  return pino({ level, name });
}

// Used by tests and by callers that have no logger of their own
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
