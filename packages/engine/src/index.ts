export { type CreateEngineOptions, createEngine } from "./core/engine/create-engine"
export { type GuardedFunction, guard } from "./core/guard/guard"
export {
  defaultEngineSettings,
  ENV_PREFIX,
  type EngineSettings,
  engineSettingsSchema,
  loadEngineSettings,
} from "./core/settings/engine-settings"
export type { Engine } from "./ports/engine"
export type { GuardOptions, GuardPolicy } from "./ports/guard-policy"
