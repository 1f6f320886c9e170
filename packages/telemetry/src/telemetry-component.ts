import type { WireboxLogger } from "@wirebox/types";
import { Component, ComponentName } from "@wirebox/core";
import { readTelemetryEnv } from "./env";
import { createLogger } from "./logger";

/** Service tag of the application logger registered by `TelemetryComponent`. */
export const LOGGER = "wirebox.logger";

/**
 * Service tag of a per-component logger. Resolve it with
 * `{ component: "<name>" }`; every call builds a child of the application logger.
 */
export const COMPONENT_LOGGER = "wirebox.logger.component";

/**
 * Registers the application logger and the per-component logger. Load it
 * first so later components can resolve a logger from their `register()` hooks.
 */
@ComponentName("telemetry")
export class TelemetryComponent extends Component {
  register(): void {
    this.container.add(LOGGER, () => createLogger(readTelemetryEnv()));
    this.container.add(
      COMPONENT_LOGGER,
      (container, params) => {
        const component = typeof params.component === "string" ? params.component : "app";
        return container.get<WireboxLogger>(LOGGER).child(component, { component });
      },
      false,
    );
  }

  boot(): void {
    const logger = this.container.get<WireboxLogger>(COMPONENT_LOGGER, { component: "telemetry" });
    logger.info("components loaded", {
      components: this.container.getComponents().map((c) => c.constructor.name),
    });
  }
}
