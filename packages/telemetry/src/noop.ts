import type { WireboxLogger } from "@wirebox/types";

/** Logger that discards every record. Useful in tests and for silenced components. */
export class NoopLogger implements WireboxLogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): WireboxLogger {
    return this;
  }

  withContext(): WireboxLogger {
    return this;
  }
}
