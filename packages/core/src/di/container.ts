import createDebug from "debug";
import type {
  ComponentState,
  Factory,
  ServiceContainer,
  ServiceDefinition,
  ServiceParams,
} from "@wirebox/types";
import type { Component, ComponentClass, ComponentReference } from "../components/component";
import { isComponentClass } from "../components/component";
import type { ComponentCatalog } from "../components/catalog";
import { assertFactory, assertServiceValue } from "./factory";
import {
  CircularResolutionException,
  ComponentNotFoundException,
  InvalidComponentReferenceException,
  InvalidComponentTypeException,
  ServiceAlreadyRegisteredException,
  ServiceNotFoundException,
} from "../errors/container-exception";

const debug = createDebug("wirebox:core:di");

type ComponentEntry = {
  component: Component;
  state: ComponentState;
};

export type ContainerOptions = {
  /** Resolves string references passed to `loadComponents`. */
  catalog?: ComponentCatalog;
};

function describeReference(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    // Null-prototype objects have no constructor.
    const owner = typeof value.constructor === "function" ? value.constructor.name : "Object";
    return `instance of ${owner}`;
  }
  return typeof value === "function" ? value.name : String(value);
}

/**
 * Service registry and lazy-instantiation container.
 *
 * Registration is add-only. Singleton services are built on their first `get`
 * and cached for the container's lifetime. Components are loaded in the order
 * given (each registers immediately) and booted later in that same order.
 */
export class Container implements ServiceContainer {
  private services = new Map<string, ServiceDefinition>();
  private singletons = new Map<string, object>();
  private variables = new Map<string, unknown>();
  private components: ComponentEntry[] = [];
  private resolving = new Set<string>();
  private readonly catalog?: ComponentCatalog;

  constructor(options: ContainerOptions = {}) {
    this.catalog = options.catalog;
  }

  has(tag: string): boolean {
    return this.services.has(tag);
  }

  add<T extends object>(tag: string, factory: Factory<T>, singleton = true): void {
    if (this.has(tag)) {
      throw new ServiceAlreadyRegisteredException(tag);
    }
    assertFactory(factory, `service '${tag}'`);

    debug("add %s (%s)", tag, singleton ? "singleton" : "transient");
    this.services.set(tag, { factory, singleton });
  }

  /**
   * Resolves a service. For a singleton, `params` only reach the factory on the
   * call that constructs it; later calls return the cached instance and ignore them.
   */
  get<T extends object = object>(tag: string, params: ServiceParams = {}): T {
    const definition = this.services.get(tag);
    if (!definition) {
      throw new ServiceNotFoundException(tag);
    }

    const cached = this.singletons.get(tag);
    if (cached) {
      debug("get %s → cached", tag);
      return cached as T;
    }

    if (this.resolving.has(tag)) {
      throw new CircularResolutionException([...this.resolving, tag]);
    }

    debug("get %s → constructing", tag);
    this.resolving.add(tag);
    try {
      const instance = assertServiceValue(definition.factory(this, params), `service '${tag}'`);
      if (definition.singleton) {
        this.singletons.set(tag, instance);
      }
      return instance as T;
    } finally {
      this.resolving.delete(tag);
    }
  }

  /** Runs a factory against this container without registering it under a tag. */
  instantiate<T extends object>(factory: Factory<T>, params: ServiceParams = {}): T {
    assertFactory(factory, "direct instantiation");
    debug("instantiate %s", factory.name || "<anonymous>");
    const instance = assertServiceValue(factory(this, params), "direct instantiation");
    return instance as T;
  }

  setVariable<T>(key: string, value: T): T {
    debug("setVariable %s", key);
    this.variables.set(key, value);
    return value;
  }

  getVariable<T = unknown>(key: string): T | undefined {
    return this.variables.get(key) as T | undefined;
  }

  hasVariable(key: string): boolean {
    return this.variables.has(key);
  }

  /**
   * Loads components in order: each is validated, constructed and registered
   * before the next one is looked at. A failure leaves earlier components loaded.
   */
  loadComponents(references: readonly ComponentReference[]): void {
    for (const reference of references) {
      const componentClass = this.resolveComponentClass(reference);

      debug("loadComponents: register %s", componentClass.name);
      const component = new componentClass(this);
      component.register();
      this.components.push({ component, state: "registered" });
    }
  }

  /** Boots every loaded component in load order. Calling it again boots them again. */
  boot(): void {
    debug("boot: %d components", this.components.length);
    for (const entry of this.components) {
      debug("boot %s", entry.component.constructor.name);
      entry.component.boot();
      entry.state = "booted";
    }
  }

  getComponents(): readonly Component[] {
    return this.components.map((entry) => entry.component);
  }

  getComponentState(component: Component): ComponentState | undefined {
    return this.components.find((entry) => entry.component === component)?.state;
  }

  private resolveComponentClass(reference: unknown): ComponentClass {
    if (typeof reference === "string") {
      const found = this.catalog?.get(reference);
      if (!found) {
        throw new ComponentNotFoundException(reference);
      }
      return this.assertComponentClass(found);
    }

    if (typeof reference !== "function") {
      throw new InvalidComponentReferenceException(describeReference(reference));
    }

    return this.assertComponentClass(reference);
  }

  private assertComponentClass(candidate: unknown): ComponentClass {
    if (!isComponentClass(candidate)) {
      throw new InvalidComponentTypeException(describeReference(candidate));
    }
    return candidate;
  }
}
