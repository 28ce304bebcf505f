import { resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, loadEnvConfig, parseArgs } from './config';

describe('parseArgs', () => {
  it('should parse every option', () => {
    expect(
      parseArgs(['-p', '8080', '--seed', 'seed.json', '--no-capacity', '--timing-log', 'logs/t.log'])
    ).toEqual({
      port: 8080,
      seedFile: resolve('seed.json'),
      enforceCapacity: false,
      timingLogFile: resolve('logs/t.log'),
    });
  });

  it('should reject an invalid port', () => {
    expect(() => parseArgs(['--port', 'abc'])).toThrow('Invalid port from --port: abc');
  });

  it('should reject a missing value', () => {
    expect(() => parseArgs(['--seed'])).toThrow('Missing value for --seed');
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('should flag help', () => {
    expect(parseArgs(['-h'])).toEqual({ help: true });
  });
});

describe('loadEnvConfig', () => {
  it('should read gateway variables', () => {
    expect(
      loadEnvConfig({ DEV_GATEWAY_PORT: '4000', ACTIVITIES_ENFORCE_CAPACITY: 'false' })
    ).toEqual({ port: 4000, enforceCapacity: false });
  });

  it('should ignore unset variables', () => {
    expect(loadEnvConfig({})).toEqual({});
  });
});

describe('loadConfig', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadConfig([], {})).toEqual(DEFAULT_CONFIG);
  });

  it('should let arguments override the environment', () => {
    const config = loadConfig(['--port', '5000'], { DEV_GATEWAY_PORT: '4000', ACTIVITIES_ENFORCE_CAPACITY: 'false' });

    expect(config.port).toBe(5000);
    expect(config.enforceCapacity).toBe(false);
    expect(config.staticDir).toBe(DEFAULT_CONFIG.staticDir);
  });
});
