import pino from "pino";
import type { Logger } from "pino";

/** The slice of the pino API executor components log through. */
export type ExecutorLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export function createLogger(level: string): Logger {
  return pino({ name: "pass-executor", level });
}
