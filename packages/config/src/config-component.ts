import createDebug from "debug";
import { Component, ComponentName } from "@wirebox/core";
import { WireboxConfig } from "./env";
import { ConfigService } from "./config-service";

const debug = createDebug("wirebox:config");

/** Service tag of the `ConfigService` registered by `ConfigComponent`. */
export const CONFIG = "wirebox.config";

/**
 * Copies `WIREBOX_VARIABLE_*` environment variables into container variables
 * and registers a `ConfigService` over the `WIREBOX_APP_*` values.
 *
 * Variables already set on the container are left as they are, so values
 * passed to the factory take precedence over the environment.
 */
@ComponentName("config")
export class ConfigComponent extends Component {
  register(): void {
    let seeded = 0;
    for (const [name, value] of Object.entries(WireboxConfig.getAllVariables())) {
      if (this.container.hasVariable(name)) {
        debug("register: variable %s already set, keeping it", name);
        continue;
      }
      this.container.setVariable(name, value);
      seeded++;
    }
    debug("register: seeded %d variables from the environment", seeded);

    this.container.add(CONFIG, () => new ConfigService(WireboxConfig.getAllAppVars()));
  }

  boot(): void {
    debug("boot: environment %s", WireboxConfig.getEnvironment());
  }
}
