/**
 * Configuration Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Configuration file (.yaml, .yml or .json)
 * 3. Built-in defaults (lowest priority)
 *
 * The merged result is validated against a Zod schema.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z, type ZodIssue } from 'zod';
import { ErrorCode, PlatformError, newError, wrap } from '../errors/index.js';
import { ServiceConfigSchema, type ServiceConfig } from './schema.js';
import { DEFAULT_ENV_PREFIX, DEFAULT_SERVICE_CONFIG, SERVICE_ENV_BINDINGS } from './defaults.js';

/**
 * How an environment variable value is converted
 */
export type EnvKind = 'string' | 'number' | 'boolean' | 'list';

/**
 * Maps one environment variable onto a dotted configuration path
 */
export interface EnvBinding {
  /** Dotted path in the configuration object, e.g. "logging.level" */
  path: string;
  /** Variable name without prefix, e.g. "LOG_LEVEL" */
  env: string;
  kind: EnvKind;
}

type ConfigRecord = Record<string, unknown>;

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Layered configuration loader
 *
 * @example
 * ```typescript
 * const config = new ConfigLoader(MySchema, MY_DEFAULTS, MY_BINDINGS)
 *   .withEnvPrefix('orders')
 *   .withFile('config/orders.yaml')
 *   .load();
 * ```
 */
export class ConfigLoader<S extends z.ZodTypeAny> {
  private envPrefix = '';
  private filePath: string | undefined;

  constructor(
    private readonly schema: S,
    private readonly defaults: z.input<S>,
    private readonly bindings: readonly EnvBinding[] = [],
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * Prefix prepended (with an underscore) to every bound variable name.
   * Stored upper-case.
   */
  withEnvPrefix(prefix: string): this {
    this.envPrefix = prefix.toUpperCase();
    return this;
  }

  withFile(filePath: string): this {
    this.filePath = filePath;
    return this;
  }

  /**
   * Load, merge and validate configuration.
   *
   * @throws {PlatformError} INT_003 when the file or an env var cannot be read
   *   or parsed, VAL_002 when a required value is missing, VAL_001 for any other
   *   schema violation
   */
  load(): z.output<S> {
    const base: unknown = structuredClone(this.defaults);
    let config: ConfigRecord = isRecord(base) ? base : {};

    if (this.filePath !== undefined) {
      const fileConfig = loadConfigFile(this.filePath);
      if (fileConfig) {
        config = deepMerge(config, fileConfig);
      }
    }

    const envConfig = this.loadEnvironmentConfig();
    if (envConfig) {
      config = deepMerge(config, envConfig);
    }

    const result = this.schema.safeParse(config);
    if (!result.success) {
      throw toValidationError(result.error);
    }
    return result.data;
  }

  /**
   * Collect values from bound environment variables.
   *
   * @returns Partial configuration, or null when no bound variable is set
   */
  loadEnvironmentConfig(): ConfigRecord | null {
    const config: ConfigRecord = {};
    let found = false;

    for (const binding of this.bindings) {
      const key = this.envPrefix ? `${this.envPrefix}_${binding.env}` : binding.env;
      const raw = this.env[key];
      if (raw === undefined) {
        continue;
      }

      try {
        setPath(config, binding.path, parseEnvValue(raw, binding.kind));
      } catch (error) {
        throw wrap(
          error,
          ErrorCode.InternalConfiguration,
          `failed to set field "${binding.path}" from env var "${key}"`,
        );
      }
      found = true;
    }

    return found ? config : null;
  }
}

/**
 * Convert a raw environment value according to its binding kind
 */
export function parseEnvValue(raw: string, kind: EnvKind): string | number | boolean | string[] {
  switch (kind) {
    case 'string':
      return raw;
    case 'number':
      if (!/^[+-]?\d+$/.test(raw.trim())) {
        throw new Error(`cannot parse integer "${raw}"`);
      }
      return parseInt(raw, 10);
    case 'boolean':
      if (TRUE_VALUES.has(raw)) {
        return true;
      }
      if (FALSE_VALUES.has(raw)) {
        return false;
      }
      throw new Error(`cannot parse bool "${raw}"`);
    case 'list':
      return raw.split(',').map((part) => part.trim());
  }
}

function setPath(target: ConfigRecord, dottedPath: string, value: unknown): void {
  const keys = dottedPath.split('.');
  const last = keys.pop();
  if (last === undefined || last === '') {
    throw new Error(`invalid configuration path "${dottedPath}"`);
  }

  let node = target;
  for (const key of keys) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: ConfigRecord = {};
      node[key] = created;
      node = created;
    }
  }
  node[last] = value;
}

/**
 * Load configuration from a YAML or JSON file.
 *
 * @param filePath - Path to the configuration file
 * @returns Parsed configuration object, or null if the file doesn't exist or is empty
 * @throws {PlatformError} INT_003 for traversal paths, unsupported extensions,
 *   unreadable files and parse failures
 */
export function loadConfigFile(filePath: string): ConfigRecord | null {
  if (filePath.split(/[\\/]/).includes('..')) {
    throw newError(
      ErrorCode.InternalConfiguration,
      'file path must not contain directory traversal (..) sequences',
    );
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
    throw newError(
      ErrorCode.InternalConfiguration,
      `unsupported file extension "${ext}" (use .yaml, .yml, or .json)`,
    );
  }

  // Missing file is not an error
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw wrap(error, ErrorCode.InternalConfiguration, `failed to read file "${filePath}"`);
  }

  let parsed: unknown;
  try {
    parsed = ext === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    const format = ext === '.json' ? 'JSON' : 'YAML';
    throw wrap(error, ErrorCode.InternalConfiguration, `failed to parse ${format} file "${filePath}"`);
  }

  // Empty file
  if (parsed === undefined || parsed === null) {
    return null;
  }

  if (!isRecord(parsed)) {
    throw newError(
      ErrorCode.InternalConfiguration,
      `invalid configuration file "${filePath}": expected a mapping`,
    );
  }

  return parsed;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Undefined source values are skipped
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

function isMissingValueIssue(issue: ZodIssue): boolean {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined';
  }
  if (issue.code === 'too_small') {
    return issue.type === 'string' && issue.minimum === 1;
  }
  return false;
}

/**
 * Format Zod validation errors into a human-readable message.
 */
export function formatValidationErrors(error: z.ZodError): string {
  const errors = error.issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`);
  return `configuration validation failed:\n${errors.join('\n')}`;
}

function toValidationError(error: z.ZodError): PlatformError {
  const missing = error.issues.find(isMissingValueIssue);
  if (missing) {
    return new PlatformError(
      ErrorCode.ValidationRequired,
      `required field "${missing.path.join('.')}" is empty`,
      { cause: error },
    );
  }
  return new PlatformError(ErrorCode.Validation, formatValidationErrors(error), {
    cause: error,
    details: { issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
  });
}

export interface ServiceConfigOptions {
  /** Configuration file; a missing file falls back to defaults */
  file?: string;
  /** Environment variable prefix (default AGENTCORE) */
  envPrefix?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the standard agent service configuration.
 */
export function loadServiceConfig(options: ServiceConfigOptions = {}): ServiceConfig {
  const loader = new ConfigLoader(
    ServiceConfigSchema,
    DEFAULT_SERVICE_CONFIG,
    SERVICE_ENV_BINDINGS,
    options.env ?? process.env,
  ).withEnvPrefix(options.envPrefix ?? DEFAULT_ENV_PREFIX);

  if (options.file !== undefined) {
    loader.withFile(options.file);
  }

  return loader.load();
}
