import type { ServiceContainer } from "./container";

// Parameters handed to a factory on the call that constructs a service.
export type ServiceParams = Readonly<Record<string, unknown>>;

// Produces one instance of a service. Services are always object or function values.
export type Factory<T extends object = object> = (
  container: ServiceContainer,
  params: ServiceParams,
) => T;

export type ServiceDefinition<T extends object = object> = {
  factory: Factory<T>;
  singleton: boolean;
};
