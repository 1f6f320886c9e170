import createDebug from "debug";
import type { ServiceParams } from "@wirebox/types";
import type { Container } from "../di/container";
import type { Component } from "../components/component";

const debug = createDebug("wirebox:core:factory");

/** A container whose components have been loaded, with a narrowed read surface. */
export class WireboxApplication {
  private booted = false;

  constructor(private container: Container) {}

  boot(): void {
    debug("boot: booting application components");
    this.container.boot();
    this.booted = true;
  }

  isBooted(): boolean {
    return this.booted;
  }

  get<T extends object = object>(tag: string, params?: ServiceParams): T {
    return this.container.get<T>(tag, params);
  }

  has(tag: string): boolean {
    return this.container.has(tag);
  }

  getVariable<T = unknown>(key: string): T | undefined {
    return this.container.getVariable<T>(key);
  }

  getContainer(): Container {
    return this.container;
  }

  getComponents(): readonly Component[] {
    return this.container.getComponents();
  }
}
