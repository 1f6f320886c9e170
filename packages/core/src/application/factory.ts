import createDebug from "debug";
import { Container } from "../di/container";
import type { ComponentReference } from "../components/component";
import type { ComponentCatalog } from "../components/catalog";
import { WireboxApplication } from "./application";

const debug = createDebug("wirebox:core:factory");

export type CreateOptions = {
  /** Resolves string entries in the component list. */
  catalog?: ComponentCatalog;
  /** Variables set on the container before any component registers. */
  variables?: Record<string, unknown>;
};

export class WireboxFactory {
  /** Loads and boots the given components, in order. */
  static create(
    components: readonly ComponentReference[],
    options?: CreateOptions,
  ): WireboxApplication {
    const app = WireboxFactory.load(components, options);
    app.boot();
    return app;
  }

  /** Loads the given components without booting them. */
  static load(
    components: readonly ComponentReference[],
    options?: CreateOptions,
  ): WireboxApplication {
    const container = new Container({ catalog: options?.catalog });

    const variables = Object.entries(options?.variables ?? {});
    debug("load: %d components, %d variables", components.length, variables.length);
    for (const [key, value] of variables) {
      container.setVariable(key, value);
    }

    container.loadComponents(components);
    return new WireboxApplication(container);
  }
}
