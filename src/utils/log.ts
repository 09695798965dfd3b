import type { LogLevel } from "../types/events";
import type { TypedEventBus } from "../types/module";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(bus: Pick<TypedEventBus, "emit">, scope: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    bus.emit("log", { level, scope, message, ts: Date.now() });
  };

  return {
    debug: (message) => write("DEBUG", message),
    info: (message) => write("INFO", message),
    warn: (message) => write("WARN", message),
    error: (message) => write("ERROR", message)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
