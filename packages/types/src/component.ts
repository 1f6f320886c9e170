/** Lifecycle of a loaded component. There is no transition back to unloaded. */
export type ComponentState = "registered" | "booted";

/** Hooks the container calls on every loaded component. */
export interface ComponentLifecycle {
  /** Called once, immediately on load. Adds the component's services. */
  register(): void;
  /** Called on every container boot, after all components have registered. */
  boot(): void;
}
