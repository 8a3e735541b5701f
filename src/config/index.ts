/**
 * Configuration Module
 *
 * All environment variable-based settings should be accessed through this module.
 */

export {
  type SessionConfig,
  type ConfigFile,
  type LoadSessionConfigOptions,
  SessionConfigSchema,
  ConfigFileSchema,
  loadConfigFile,
  loadEnvConfig,
  mergeConfig,
  loadSessionConfig,
} from './session-config.js';
