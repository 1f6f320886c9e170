export { WireboxLoggerImpl, createLogger, resolveLogFormat, resolveRedactPaths } from "./logger";
export { NoopLogger } from "./noop";
export { readTelemetryEnv } from "./env";
export { TelemetryComponent, LOGGER, COMPONENT_LOGGER } from "./telemetry-component";

export type { TelemetryConfig, LogFormat } from "./env";
export type { LogLevel, WireboxLogger } from "@wirebox/types";
