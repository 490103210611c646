import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
  ConfigLoader,
  DEFAULT_SERVICE_CONFIG,
  deepMerge,
  loadConfigFile,
  loadServiceConfig,
  parseEnvValue
} from '../../src/config/index.js';
import { ErrorCode, PlatformError, getCode } from '../../src/errors/index.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('Configuration Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'agentcore-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  describe('loadServiceConfig()', () => {
    it('should return defaults with no file and no environment', () => {
      expect(loadServiceConfig({ env: {} })).toEqual(DEFAULT_SERVICE_CONFIG);
    });

    it('should not mutate the defaults', () => {
      loadServiceConfig({ env: { AGENTCORE_AGENT_CAPABILITIES: 'a@1.0.0' } });
      expect(DEFAULT_SERVICE_CONFIG.agent.capabilities).toEqual(['example-processing@1.0.0']);
    });

    it('should fall back to defaults when the file does not exist', () => {
      const config = loadServiceConfig({ file: path.join(tempDir, 'missing.yaml'), env: {} });
      expect(config).toEqual(DEFAULT_SERVICE_CONFIG);
    });

    it('should merge a YAML file over defaults', () => {
      const file = writeFile(
        'agent.yaml',
        ['agent:', '  name: file-agent', '  version: 2.0.0', 'logging:', '  level: debug'].join('\n')
      );

      const config = loadServiceConfig({ file, env: {} });

      expect(config.agent).toEqual({
        id: 'example-001',
        name: 'file-agent',
        version: '2.0.0',
        capabilities: ['example-processing@1.0.0']
      });
      expect(config.logging.level).toBe('debug');
      expect(config.logging.consoleOutput).toBe(true);
    });

    it('should merge a JSON file over defaults', () => {
      const file = writeFile('agent.json', JSON.stringify({ agent: { id: 'json-001' } }));
      expect(loadServiceConfig({ file, env: {} }).agent.id).toBe('json-001');
    });

    it('should replace lists from the file rather than merge them', () => {
      const file = writeFile(
        'agent.yml',
        ['agent:', '  capabilities:', '    - summarize@1.0.0', '    - translate@2.1.0'].join('\n')
      );

      expect(loadServiceConfig({ file, env: {} }).agent.capabilities).toEqual([
        'summarize@1.0.0',
        'translate@2.1.0'
      ]);
    });

    it('should treat an empty file as no overrides', () => {
      const file = writeFile('empty.yaml', '');
      expect(loadServiceConfig({ file, env: {} })).toEqual(DEFAULT_SERVICE_CONFIG);
    });

    it('should let environment variables override the file', () => {
      const file = writeFile('agent.yaml', ['agent:', '  name: file-agent', '  version: 2.0.0'].join('\n'));

      const config = loadServiceConfig({
        file,
        env: { AGENTCORE_AGENT_NAME: 'env-agent', AGENTCORE_LOG_JSON: 'true' }
      });

      expect(config.agent.name).toBe('env-agent');
      expect(config.agent.version).toBe('2.0.0');
      expect(config.logging.json).toBe(true);
    });

    it('should split list variables on commas and trim entries', () => {
      const config = loadServiceConfig({
        env: { AGENTCORE_AGENT_CAPABILITIES: 'summarize@1.0.0, translate@2.1.0' }
      });
      expect(config.agent.capabilities).toEqual(['summarize@1.0.0', 'translate@2.1.0']);
    });

    it('should honor a custom prefix case-insensitively', () => {
      const config = loadServiceConfig({
        envPrefix: 'orders',
        env: { ORDERS_AGENT_ID: 'orders-001', AGENTCORE_AGENT_ID: 'ignored' }
      });
      expect(config.agent.id).toBe('orders-001');
    });

    it('should report an empty required value as VAL_002', () => {
      const error = thrownBy(() => loadServiceConfig({ env: { AGENTCORE_AGENT_ID: '' } }));

      expect(error).toBeInstanceOf(PlatformError);
      expect(error).toMatchObject({
        code: ErrorCode.ValidationRequired,
        message: 'required field "agent.id" is empty'
      });
    });

    it('should report a malformed capability as VAL_001', () => {
      const error = thrownBy(() =>
        loadServiceConfig({ env: { AGENTCORE_AGENT_CAPABILITIES: 'summarize' } })
      );

      expect(error).toMatchObject({
        code: ErrorCode.Validation,
        message: 'configuration validation failed:\n  • agent.capabilities.0: capability must be in name@version form',
        details: {
          issues: [{ path: 'agent.capabilities.0', message: 'capability must be in name@version form' }]
        }
      });
    });

    it('should report an unknown log level as VAL_001', () => {
      const error = thrownBy(() => loadServiceConfig({ env: { AGENTCORE_LOG_LEVEL: 'verbose' } }));
      expect(getCode(error)).toBe(ErrorCode.Validation);
      expect(error).toBeInstanceOf(PlatformError);
      expect(error).toHaveProperty('details.issues.0.path', 'logging.level');
    });

    it('should report a wrongly typed file value as VAL_001', () => {
      const file = writeFile('agent.yaml', ['agent:', '  id: 123'].join('\n'));
      const error = thrownBy(() => loadServiceConfig({ file, env: {} }));
      expect(getCode(error)).toBe(ErrorCode.Validation);
    });

    it('should report an unparsable boolean variable as INT_003', () => {
      const error = thrownBy(() => loadServiceConfig({ env: { AGENTCORE_LOG_CONSOLE: 'yes' } }));

      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: 'failed to set field "logging.consoleOutput" from env var "AGENTCORE_LOG_CONSOLE"'
      });
      expect(error).toHaveProperty('cause.message', 'cannot parse bool "yes"');
    });
  });

  describe('loadConfigFile()', () => {
    it('should reject directory traversal before touching the filesystem', () => {
      const error = thrownBy(() => loadConfigFile('configs/../secret.yaml'));
      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: 'file path must not contain directory traversal (..) sequences'
      });
    });

    it('should reject unsupported extensions even for missing files', () => {
      const error = thrownBy(() => loadConfigFile(path.join(tempDir, 'agent.toml')));
      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: 'unsupported file extension ".toml" (use .yaml, .yml, or .json)'
      });
    });

    it('should return null for a missing file', () => {
      expect(loadConfigFile(path.join(tempDir, 'absent.json'))).toBeNull();
    });

    it('should wrap YAML syntax errors', () => {
      const file = writeFile('broken.yaml', 'agent: [unclosed');
      const error = thrownBy(() => loadConfigFile(file));

      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: `failed to parse YAML file "${file}"`
      });
      expect(error).toHaveProperty('cause');
    });

    it('should wrap JSON syntax errors', () => {
      const file = writeFile('broken.json', '{"agent":');
      const error = thrownBy(() => loadConfigFile(file));

      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: `failed to parse JSON file "${file}"`
      });
    });

    it('should reject a document that is not a mapping', () => {
      const file = writeFile('list.yaml', '- a\n- b\n');
      const error = thrownBy(() => loadConfigFile(file));

      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: `invalid configuration file "${file}": expected a mapping`
      });
    });

    it('should return the parsed mapping', () => {
      const file = writeFile('agent.yaml', 'agent:\n  id: yaml-001\n');
      expect(loadConfigFile(file)).toEqual({ agent: { id: 'yaml-001' } });
    });
  });

  describe('ConfigLoader', () => {
    const ServerSchema = z.object({
      host: z.string().min(1),
      port: z.number().int().positive(),
      tls: z.boolean()
    });
    const bindings = [
      { path: 'host', env: 'HOST', kind: 'string' as const },
      { path: 'port', env: 'PORT', kind: 'number' as const },
      { path: 'tls', env: 'TLS', kind: 'boolean' as const }
    ];

    it('should load a custom schema with its own bindings', () => {
      const config = new ConfigLoader(ServerSchema, { host: 'localhost', port: 8080, tls: false }, bindings, {
        SVC_PORT: '9090',
        SVC_TLS: 'T'
      })
        .withEnvPrefix('svc')
        .load();

      expect(config).toEqual({ host: 'localhost', port: 9090, tls: true });
    });

    it('should read unprefixed variables when no prefix is set', () => {
      const config = new ConfigLoader(ServerSchema, { host: 'localhost', port: 8080, tls: false }, bindings, {
        HOST: 'example.internal'
      }).load();

      expect(config.host).toBe('example.internal');
    });

    it('should wrap integer parse failures with the variable name', () => {
      const loader = new ConfigLoader(ServerSchema, { host: 'localhost', port: 8080, tls: false }, bindings, {
        SVC_PORT: '80x'
      }).withEnvPrefix('SVC');

      const error = thrownBy(() => loader.load());
      expect(error).toMatchObject({
        code: ErrorCode.InternalConfiguration,
        message: 'failed to set field "port" from env var "SVC_PORT"'
      });
      expect(error).toHaveProperty('cause.message', 'cannot parse integer "80x"');
    });

    it('should return null from loadEnvironmentConfig when nothing is set', () => {
      const loader = new ConfigLoader(ServerSchema, { host: 'localhost', port: 8080, tls: false }, bindings, {});
      expect(loader.loadEnvironmentConfig()).toBeNull();
    });

    it('should keep the zod error as the cause of a missing-value failure', () => {
      const loader = new ConfigLoader(ServerSchema, { host: '', port: 8080, tls: false }, bindings, {});
      const error = thrownBy(() => loader.load());

      expect(getCode(error)).toBe(ErrorCode.ValidationRequired);
      expect(error).toBeInstanceOf(PlatformError);
      expect(error).toHaveProperty('cause.issues.0.path', ['host']);
    });
  });

  describe('parseEnvValue()', () => {
    it('should accept the recognized boolean spellings', () => {
      for (const raw of ['1', 't', 'T', 'TRUE', 'true', 'True']) {
        expect(parseEnvValue(raw, 'boolean')).toBe(true);
      }
      for (const raw of ['0', 'f', 'F', 'FALSE', 'false', 'False']) {
        expect(parseEnvValue(raw, 'boolean')).toBe(false);
      }
    });

    it('should reject other boolean spellings', () => {
      expect(() => parseEnvValue('yes', 'boolean')).toThrow('cannot parse bool "yes"');
      expect(() => parseEnvValue('tRUE', 'boolean')).toThrow('cannot parse bool "tRUE"');
    });

    it('should parse signed integers', () => {
      expect(parseEnvValue('42', 'number')).toBe(42);
      expect(parseEnvValue('-7', 'number')).toBe(-7);
      expect(() => parseEnvValue('4.2', 'number')).toThrow('cannot parse integer "4.2"');
    });

    it('should keep strings verbatim', () => {
      expect(parseEnvValue('  padded ', 'string')).toBe('  padded ');
    });
  });

  describe('deepMerge()', () => {
    it('should merge nested objects and replace arrays', () => {
      const merged = deepMerge(
        { agent: { id: 'a', tags: ['x', 'y'] }, logging: { level: 'info' } },
        { agent: { tags: ['z'] }, logging: { json: true } }
      );

      expect(merged).toEqual({
        agent: { id: 'a', tags: ['z'] },
        logging: { level: 'info', json: true }
      });
    });

    it('should skip undefined source values', () => {
      expect(deepMerge({ level: 'info' }, { level: undefined })).toEqual({ level: 'info' });
    });

    it('should not modify its inputs', () => {
      const target = { agent: { id: 'a' } };
      deepMerge(target, { agent: { id: 'b' } });
      expect(target).toEqual({ agent: { id: 'a' } });
    });
  });
});
