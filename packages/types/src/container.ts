import type { Factory, ServiceParams } from "./common";

/** Minimal service container contract handed to factories. */
export interface ServiceContainer {
  has(tag: string): boolean;
  add<T extends object>(tag: string, factory: Factory<T>, singleton?: boolean): void;
  get<T extends object = object>(tag: string, params?: ServiceParams): T;
  instantiate<T extends object>(factory: Factory<T>, params?: ServiceParams): T;
  setVariable<T>(key: string, value: T): T;
  getVariable<T = unknown>(key: string): T | undefined;
  hasVariable(key: string): boolean;
}
