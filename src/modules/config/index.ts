/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, getByPath, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ThreadsmithConfigSchema,
  PartialThreadsmithConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  ThreadsmithConfig,
  PartialThreadsmithConfig,
  ProviderSettings,
  QualitySettings,
  RetrievalSettings,
  TransportSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG, DEFAULT_BASE_URL, DEFAULT_STATE_DIR } from './defaults.js'
export { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
