/**
 * Default Configuration Values
 */

import type { ServiceConfig } from './schema.js';
import type { EnvBinding } from './loader.js';

/**
 * Environment variable prefix used by {@link loadServiceConfig}
 */
export const DEFAULT_ENV_PREFIX = 'AGENTCORE';

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  agent: {
    id: 'example-001',
    name: 'example-agent',
    version: '1.0.0',
    capabilities: ['example-processing@1.0.0'],
  },
  logging: {
    level: 'info',
    consoleOutput: true,
    json: false,
  },
};

/**
 * Environment variables recognized for {@link ServiceConfig}, without prefix.
 * With the default prefix `AGENT_ID` is read from `AGENTCORE_AGENT_ID`.
 */
export const SERVICE_ENV_BINDINGS: readonly EnvBinding[] = [
  { path: 'agent.id', env: 'AGENT_ID', kind: 'string' },
  { path: 'agent.name', env: 'AGENT_NAME', kind: 'string' },
  { path: 'agent.version', env: 'AGENT_VERSION', kind: 'string' },
  { path: 'agent.capabilities', env: 'AGENT_CAPABILITIES', kind: 'list' },
  { path: 'logging.level', env: 'LOG_LEVEL', kind: 'string' },
  { path: 'logging.filePath', env: 'LOG_FILE', kind: 'string' },
  { path: 'logging.consoleOutput', env: 'LOG_CONSOLE', kind: 'boolean' },
  { path: 'logging.json', env: 'LOG_JSON', kind: 'boolean' },
];
