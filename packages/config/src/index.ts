export { WireboxConfig } from "./env";
export type { Environment } from "./env";

export { ConfigService } from "./config-service";
export { ConfigComponent, CONFIG } from "./config-component";
