export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger available as a container service. */
export interface WireboxLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a named child logger. Adds the name to all log records. */
  child(name: string, attributes?: Record<string, unknown>): WireboxLogger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): WireboxLogger;
}
