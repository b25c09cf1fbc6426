import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  ConfigSchema,
  CONFIG_FILE,
  getConfigValue,
  loadConfigFile,
  parsePort,
  resolveConfig,
} from '../../src/config/index.js';
import { ConfigError } from '../../src/errors.js';

function tmpDir(): string {
  const dir = path.join(os.tmpdir(), `tm-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

function writeConfig(dir: string, contents: unknown, name = CONFIG_FILE): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, typeof contents === 'string' ? contents : JSON.stringify(contents));
  return filePath;
}

describe('ConfigSchema', () => {
  it('parses empty object to defaults', () => {
    expect(ConfigSchema.parse({})).toEqual({
      version: 1,
      server: { transport: 'http', host: '127.0.0.1', port: 8181 },
      logging: { debug: false },
    });
  });

  it('rejects out-of-range ports', () => {
    expect(() => ConfigSchema.parse({ server: { port: 0 } })).toThrow();
    expect(() => ConfigSchema.parse({ server: { port: 70000 } })).toThrow();
  });

  it('rejects unknown transports', () => {
    expect(() => ConfigSchema.parse({ server: { transport: 'sse' } })).toThrow();
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => { dir = tmpDir(); });
  afterEach(() => cleanup(dir));

  it('returns nothing when the default file is absent', () => {
    expect(loadConfigFile(undefined, dir)).toEqual({});
  });

  it('reads the default file from the working directory', () => {
    writeConfig(dir, { server: { port: 9000 } });
    expect(loadConfigFile(undefined, dir)).toEqual({ server: { port: 9000 } });
  });

  it('requires an explicit path to exist', () => {
    const missing = path.join(dir, 'missing.json');
    expect(() => loadConfigFile('missing.json', dir)).toThrow(ConfigError);
    expect(() => loadConfigFile('missing.json', dir)).toThrow(`Config file not found (${missing})`);
  });

  it('rejects malformed JSON', () => {
    writeConfig(dir, '{ not json');
    expect(() => loadConfigFile(undefined, dir)).toThrow(/^Could not read config: /);
  });

  it('rejects JSON that is not an object', () => {
    const filePath = writeConfig(dir, [1, 2, 3]);
    expect(() => loadConfigFile(undefined, dir)).toThrow(`Config must be a JSON object (${filePath})`);
  });
});

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(() => { dir = tmpDir(); });
  afterEach(() => cleanup(dir));

  it('falls back to defaults', () => {
    expect(resolveConfig({ cwd: dir, env: {} })).toEqual(ConfigSchema.parse({}));
  });

  it('applies the config file', () => {
    writeConfig(dir, { server: { transport: 'stdio', port: 9000 }, logging: { debug: true } });
    const config = resolveConfig({ cwd: dir, env: {} });
    expect(config.server).toEqual({ transport: 'stdio', host: '127.0.0.1', port: 9000 });
    expect(config.logging.debug).toBe(true);
  });

  it('reads an explicit config path', () => {
    writeConfig(dir, { server: { host: '0.0.0.0' } }, 'custom.json');
    expect(resolveConfig({ cwd: dir, env: {}, configPath: 'custom.json' }).server.host).toBe('0.0.0.0');
  });

  it('lets the environment override the file', () => {
    writeConfig(dir, { server: { port: 9000 } });
    const config = resolveConfig({
      cwd: dir,
      env: { TAGGED_MEMORY_PORT: '9100', TAGGED_MEMORY_TRANSPORT: 'stdio', TAGGED_MEMORY_DEBUG: 'yes' },
    });
    expect(config.server.port).toBe(9100);
    expect(config.server.transport).toBe('stdio');
    expect(config.logging.debug).toBe(true);
  });

  it('lets command-line overrides win over everything', () => {
    writeConfig(dir, { server: { port: 9000 }, logging: { debug: true } });
    const config = resolveConfig({
      cwd: dir,
      env: { TAGGED_MEMORY_PORT: '9100' },
      overrides: { port: '9200', debug: false, host: 'localhost' },
    });
    expect(config.server).toEqual({ transport: 'http', host: 'localhost', port: 9200 });
    expect(config.logging.debug).toBe(false);
  });

  it('ignores empty environment values', () => {
    const config = resolveConfig({ cwd: dir, env: { TAGGED_MEMORY_PORT: '', TAGGED_MEMORY_DEBUG: '' } });
    expect(config.server.port).toBe(8181);
    expect(config.logging.debug).toBe(false);
  });

  it('rejects an unparseable boolean', () => {
    expect(() => resolveConfig({ cwd: dir, env: { TAGGED_MEMORY_DEBUG: 'maybe' } })).toThrow(
      'Invalid boolean for TAGGED_MEMORY_DEBUG: maybe'
    );
  });

  it('names the offending key for invalid values', () => {
    expect(() => resolveConfig({ cwd: dir, env: {}, overrides: { transport: 'sse' } })).toThrow(
      /^Invalid configuration: server\.transport: /
    );
  });

  it('rejects an out-of-range port', () => {
    expect(() => resolveConfig({ cwd: dir, env: {}, overrides: { port: 99999 } })).toThrow(ConfigError);
  });
});

describe('parsePort', () => {
  it('parses numeric strings', () => {
    expect(parsePort('8080')).toBe(8080);
    expect(parsePort(3000)).toBe(3000);
  });

  it('treats empty values as unset', () => {
    expect(parsePort(undefined)).toBeUndefined();
    expect(parsePort('')).toBeUndefined();
  });

  it('rejects non-integers', () => {
    expect(() => parsePort('http')).toThrow('Invalid port: http');
    expect(() => parsePort('80.5')).toThrow(ConfigError);
  });
});

describe('getConfigValue', () => {
  const config = ConfigSchema.parse({ server: { port: 9000 } });

  it('reads dotted keys', () => {
    expect(getConfigValue(config, 'server.port')).toBe(9000);
    expect(getConfigValue(config, 'logging')).toEqual({ debug: false });
  });

  it('returns undefined for unknown keys', () => {
    expect(getConfigValue(config, 'server.nope')).toBeUndefined();
    expect(getConfigValue(config, 'server.port.deeper')).toBeUndefined();
  });

  it('ignores inherited properties', () => {
    expect(getConfigValue(config, 'toString')).toBeUndefined();
    expect(getConfigValue(config, 'server.constructor')).toBeUndefined();
  });
});
