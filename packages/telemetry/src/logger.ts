import pino from "pino";
import type { LogLevel, WireboxLogger } from "@wirebox/types";
import type { TelemetryConfig } from "./env";

type Attributes = Record<string, unknown>;

/** `WireboxLogger` over a pino instance. Attributes become fields of the record. */
export class WireboxLoggerImpl implements WireboxLogger {
  constructor(private readonly target: pino.Logger) {}

  debug(message: string, attributes?: Attributes): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: Attributes): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: Attributes): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: Attributes): void {
    this.write("error", message, attributes);
  }

  child(name: string, attributes?: Attributes): WireboxLogger {
    return new WireboxLoggerImpl(this.target.child({ name, ...attributes }));
  }

  withContext(attributes: Attributes): WireboxLogger {
    return new WireboxLoggerImpl(this.target.child(attributes));
  }

  private write(level: LogLevel, message: string, attributes?: Attributes): void {
    if (attributes === undefined) {
      this.target[level](message);
      return;
    }
    this.target[level](attributes, message);
  }
}

/** Human output everywhere except production, unless a format is forced. */
export function resolveLogFormat(config: TelemetryConfig): "json" | "human" {
  if (config.logFormat !== "auto") return config.logFormat;
  return config.environment === "production" ? "json" : "human";
}

export function resolveRedactPaths(): string[] {
  const keys = process.env.WIREBOX_LOG_REDACT_KEYS;
  if (!keys) return [];
  return keys
    .split(",")
    .map((k) => k.trim())
    .filter(Boolean);
}

function createStreams(config: TelemetryConfig): pino.StreamEntry[] {
  const level = config.logLevel;
  const stdout =
    resolveLogFormat(config) === "human"
      ? pino.transport({ target: "pino-pretty", options: { destination: 1 } })
      : pino.destination(1);

  const streams: pino.StreamEntry[] = [{ level, stream: stdout }];
  if (config.logFilePath) {
    streams.push({ level, stream: pino.destination(config.logFilePath) });
  }
  return streams;
}

export function createLogger(config: TelemetryConfig): WireboxLoggerImpl {
  const redactPaths = resolveRedactPaths();

  const logger = pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName, environment: config.environment },
      redact: redactPaths.length > 0 ? { paths: redactPaths, censor: "[REDACTED]" } : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(createStreams(config)),
  );

  return new WireboxLoggerImpl(logger);
}
