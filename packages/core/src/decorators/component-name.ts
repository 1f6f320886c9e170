import "reflect-metadata";
import { COMPONENT_NAME_METADATA } from "../metadata/constants";

/**
 * Sets the name a component is known by in a `ComponentCatalog`, so it can be
 * loaded by string reference. Without it the catalog falls back to the class name.
 */
export function ComponentName(name: string): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(COMPONENT_NAME_METADATA, name, target);
  };
}

export function getComponentName(target: Function): string {
  const name: unknown = Reflect.getOwnMetadata(COMPONENT_NAME_METADATA, target);
  return typeof name === "string" ? name : target.name;
}
