import createDebug from "debug";
import type { ComponentClass } from "./component";
import { getComponentName } from "../decorators/component-name";
import { ComponentNameConflictException } from "../errors/container-exception";

const debug = createDebug("wirebox:core:components");

/** Name → class lookup used to resolve string component references. */
export class ComponentCatalog {
  private entries = new Map<string, ComponentClass>();

  constructor(components: ComponentClass[] = []) {
    for (const component of components) {
      this.add(component);
    }
  }

  add(component: ComponentClass, name: string = getComponentName(component)): this {
    if (this.entries.has(name)) {
      throw new ComponentNameConflictException(name);
    }
    debug("catalog add %s (%s)", name, component.name);
    this.entries.set(name, component);
    return this;
  }

  get(name: string): ComponentClass | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}
