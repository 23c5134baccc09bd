/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  readEnvOverrides,
  assertReadableFormat,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  HookstageConfigSchema,
  PartialHookstageConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  HookstageConfig,
  PartialHookstageConfig,
  HookSettings,
  ReadinessSettings,
  KubectlSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
