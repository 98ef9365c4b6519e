export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigValidationError } from "./core/config-validation-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { PropertyEnvironment, loadEnvironment } from "./core/property-environment"
export type { ConfigView } from "./ports/config"
export type { Environment } from "./ports/environment"
export type { ConfigSource } from "./ports/source"
