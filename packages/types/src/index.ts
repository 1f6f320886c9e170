export type { ServiceParams, Factory, ServiceDefinition } from "./common";

export type { ServiceContainer } from "./container";

export type { ComponentState, ComponentLifecycle } from "./component";

export type { Schema } from "./validation";

export type { LogLevel, WireboxLogger } from "./telemetry";
