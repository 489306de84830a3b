export * from './migrations/index.js';
export { loadSettings, loadLayoutSettings, settingsFromEnv, DEFAULT_CONFIG_FILE } from './env/settings.js';
export type { LoadSettingsOptions } from './env/settings.js';
export { MigratorSettingsSchema, LayoutSettingsSchema } from './env/types.js';
export type { MigratorSettings, LayoutSettings, SettingsInput } from './env/types.js';
export { connectDatabase } from './db/connection.js';
export type { DatabaseConnection } from './db/connection.js';
export { Logger, createLogger, LogLevel } from './utils/logger.js';
export type { LoggerOptions } from './utils/logger.js';
export {
  MigratorError,
  ConfigurationError,
  DiscoveryError,
  LoadError,
  PrerequisiteError,
  OperationError,
  getErrorMessage
} from './utils/errors.js';
export type { OperationPhase } from './utils/errors.js';
