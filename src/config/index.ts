/**
 * Configuration Management Module
 *
 * Main API for loading and validating service configuration.
 *
 * @example
 * ```typescript
 * import { loadServiceConfig } from './config/index.js';
 *
 * // Defaults < ./agent.yaml < AGENTCORE_* environment variables
 * const config = loadServiceConfig({ file: 'agent.yaml' });
 * console.log(config.agent.id);
 * ```
 */

// Schema exports
export {
  type AgentConfig,
  type LoggingConfig,
  type ServiceConfig,
  AgentConfigSchema,
  LoggingConfigSchema,
  ServiceConfigSchema,
  CAPABILITY_REF_PATTERN,
} from './schema.js';

// Default configuration
export { DEFAULT_SERVICE_CONFIG, DEFAULT_ENV_PREFIX, SERVICE_ENV_BINDINGS } from './defaults.js';

// Loader
export {
  ConfigLoader,
  loadServiceConfig,
  loadConfigFile,
  parseEnvValue,
  deepMerge,
  formatValidationErrors,
  type EnvBinding,
  type EnvKind,
  type ServiceConfigOptions,
} from './loader.js';
