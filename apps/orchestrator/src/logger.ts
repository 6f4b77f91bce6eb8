import pino, { type BaseLogger } from "pino";

export type { BaseLogger };

export function createLogger(name: string, level = process.env.LOG_LEVEL ?? "info"): BaseLogger {
  return pino({ name, level });
}

export function silentLogger(): BaseLogger {
  return pino({ level: "silent" });
}
