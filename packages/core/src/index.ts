import "reflect-metadata";

// DI
export { Container } from "./di/container";
export { assertFactory, assertServiceValue } from "./di/factory";

// Components
export { Component, isComponentClass } from "./components/component";
export { ComponentCatalog } from "./components/catalog";
export { ComponentName, getComponentName } from "./decorators/component-name";

// Application
export { WireboxFactory } from "./application/factory";
export { WireboxApplication } from "./application/application";

// Errors
export {
  ContainerException,
  ServiceAlreadyRegisteredException,
  InvalidFactorySignatureException,
  ServiceNotFoundException,
  CircularResolutionException,
  InvalidComponentReferenceException,
  ComponentNotFoundException,
  InvalidComponentTypeException,
  ComponentNameConflictException,
} from "./errors/container-exception";

// Metadata constants
export { COMPONENT_NAME_METADATA } from "./metadata/constants";

// Re-export key types from @wirebox/types
export type {
  Factory,
  ServiceParams,
  ServiceDefinition,
  ServiceContainer,
  ComponentState,
  ComponentLifecycle,
} from "@wirebox/types";

// Re-export types defined in core
export type { ContainerOptions } from "./di/container";
export type { ComponentClass, ComponentReference } from "./components/component";
export type { ContainerErrorCode } from "./errors/container-exception";
export type { CreateOptions } from "./application/factory";
