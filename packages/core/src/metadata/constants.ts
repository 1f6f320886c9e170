export const COMPONENT_NAME_METADATA = Symbol("wirebox:component-name");
