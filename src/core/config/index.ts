/**
 * @arch shiftmap.core.barrel
 */
export {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  getConfigPath,
  toBuildOptions,
  applyLoggingConfig,
} from './loader.js';
export type { ConfigOverrides } from './loader.js';
export {
  ConfigSchema,
  GraphSettingsSchema,
  LoggingSettingsSchema,
  LogLevelSchema,
} from './schema.js';
export type { Config, GraphSettings, LoggingSettings } from './schema.js';
