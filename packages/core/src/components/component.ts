import type { ComponentLifecycle } from "@wirebox/types";
import type { Container } from "../di/container";

/**
 * Base class for an ordered unit of registration and boot logic.
 *
 * `register()` runs as soon as the component is loaded and should only add
 * services. `boot()` runs once every component has registered, so it may
 * resolve services added by components loaded after this one.
 */
export abstract class Component implements ComponentLifecycle {
  constructor(protected readonly container: Container) {}

  abstract register(): void;

  abstract boot(): void;
}

export type ComponentClass<T extends Component = Component> = new (container: Container) => T;

/** A component class, or the name it is registered under in a catalog. */
export type ComponentReference = ComponentClass | string;

/** Components must extend `Component` directly, not through another component. */
export function isComponentClass(value: unknown): value is ComponentClass {
  return typeof value === "function" && Object.getPrototypeOf(value) === Component;
}
