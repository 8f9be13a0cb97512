export { WiregraphConfig, APP_VAR_PREFIX, toParameterName } from "./env";
export type { EnvSource } from "./env";
export { bindEnvironment, coerceValue } from "./env-bindings";
export type { Coercion, EnvBindingOptions } from "./env-bindings";
