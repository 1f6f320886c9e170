export type ContainerErrorCode =
  | "SERVICE_ALREADY_REGISTERED"
  | "INVALID_FACTORY_SIGNATURE"
  | "SERVICE_NOT_FOUND"
  | "CIRCULAR_RESOLUTION"
  | "INVALID_COMPONENT_REFERENCE"
  | "COMPONENT_NOT_FOUND"
  | "INVALID_COMPONENT_TYPE"
  | "COMPONENT_NAME_CONFLICT";

export class ContainerException extends Error {
  constructor(
    public readonly code: ContainerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ContainerException";
  }
}

export class ServiceAlreadyRegisteredException extends ContainerException {
  constructor(public readonly tag: string) {
    super("SERVICE_ALREADY_REGISTERED", `A service with the tag '${tag}' already exists.`);
    this.name = "ServiceAlreadyRegisteredException";
  }
}

export class InvalidFactorySignatureException extends ContainerException {
  constructor(subject: string, reason: string) {
    super("INVALID_FACTORY_SIGNATURE", `Invalid factory for ${subject}. ${reason}`);
    this.name = "InvalidFactorySignatureException";
  }
}

export class ServiceNotFoundException extends ContainerException {
  constructor(public readonly tag: string) {
    super("SERVICE_NOT_FOUND", `Service with the tag '${tag}' not found.`);
    this.name = "ServiceNotFoundException";
  }
}

export class CircularResolutionException extends ContainerException {
  constructor(public readonly path: readonly string[]) {
    super("CIRCULAR_RESOLUTION", `Circular service resolution detected: ${path.join(" → ")}`);
    this.name = "CircularResolutionException";
  }
}

export class InvalidComponentReferenceException extends ContainerException {
  constructor(received: string) {
    super(
      "INVALID_COMPONENT_REFERENCE",
      `Invalid component ${received}. Class reference expected, instance given.`,
    );
    this.name = "InvalidComponentReferenceException";
  }
}

export class ComponentNotFoundException extends ContainerException {
  constructor(public readonly componentName: string) {
    super("COMPONENT_NOT_FOUND", `Component class '${componentName}' not found.`);
    this.name = "ComponentNotFoundException";
  }
}

export class InvalidComponentTypeException extends ContainerException {
  constructor(componentName: string) {
    super(
      "INVALID_COMPONENT_TYPE",
      `Invalid component ${componentName}. A component must directly extend the Component abstract class.`,
    );
    this.name = "InvalidComponentTypeException";
  }
}

export class ComponentNameConflictException extends ContainerException {
  constructor(public readonly componentName: string) {
    super(
      "COMPONENT_NAME_CONFLICT",
      `A component named '${componentName}' is already in the catalog.`,
    );
    this.name = "ComponentNameConflictException";
  }
}
