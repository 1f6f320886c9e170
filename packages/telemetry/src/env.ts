import type { LogLevel } from "@wirebox/types";
import { WireboxConfig } from "@wirebox/config";
import type { Environment } from "@wirebox/config";

export type LogFormat = "json" | "human" | "auto";

export type TelemetryConfig = {
  serviceName: string;
  environment: Environment;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
};

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

const LOG_FORMATS: Record<string, LogFormat> = {
  json: "json",
  human: "human",
  auto: "auto",
};

export function readTelemetryEnv(): TelemetryConfig {
  const rawLevel = process.env.WIREBOX_LOG_LEVEL ?? "";
  const rawFormat = process.env.WIREBOX_LOG_FORMAT ?? "";

  return {
    serviceName: process.env.WIREBOX_SERVICE_NAME ?? "wirebox-app",
    environment: WireboxConfig.getEnvironment(),
    logLevel: LOG_LEVELS[rawLevel] ?? "info",
    logFormat: LOG_FORMATS[rawFormat] ?? "auto",
    logFilePath: process.env.WIREBOX_LOG_FILE_PATH ?? null,
  };
}
