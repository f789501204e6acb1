import { describe, expect, it } from 'vitest';
import { loadServerConfig, parseArgs, toServerConfig } from '../config.js';

describe('parseArgs', () => {
  it('should read long and short flags with values', () => {
    expect(parseArgs(['--port', '3000', '-h', 'localhost', '--debug'])).toEqual({
      port: '3000',
      h: 'localhost',
      debug: true,
    });
  });

  it('should treat a flag followed by another flag as boolean', () => {
    expect(parseArgs(['--help', '--version'])).toEqual({ help: true, version: true });
  });

  it('should ignore positional arguments', () => {
    expect(parseArgs(['serve', '--path', '/ws'])).toEqual({ path: '/ws' });
  });
});

describe('loadServerConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadServerConfig({}, {})).toEqual({
      ok: true,
      settings: {
        port: 8080,
        host: '0.0.0.0',
        path: '/sync',
        logLevel: 'info',
        offlineQueueLimit: 500,
        clientTimeout: 60000,
        maxClockSkewMs: 300000,
      },
    });
  });

  it('should read COMPANION_SYNC_* variables', () => {
    const result = loadServerConfig(
      {},
      {
        COMPANION_SYNC_PORT: '9000',
        COMPANION_SYNC_HOST: '127.0.0.1',
        COMPANION_SYNC_LOG_LEVEL: 'warn',
        COMPANION_SYNC_OFFLINE_QUEUE_LIMIT: '50',
        COMPANION_SYNC_MAX_CLOCK_SKEW: '1000',
      }
    );

    expect(result.ok && result.settings).toMatchObject({
      port: 9000,
      host: '127.0.0.1',
      logLevel: 'warn',
      offlineQueueLimit: 50,
      maxClockSkewMs: 1000,
    });
  });

  it('should let flags win over the environment', () => {
    const result = loadServerConfig(parseArgs(['-p', '7000', '--debug']), {
      COMPANION_SYNC_PORT: '9000',
      COMPANION_SYNC_LOG_LEVEL: 'error',
    });

    expect(result.ok && result.settings).toMatchObject({ port: 7000, logLevel: 'debug' });
  });

  it('should ignore empty variables', () => {
    const result = loadServerConfig({}, { COMPANION_SYNC_PORT: '' });

    expect(result.ok && result.settings.port).toBe(8080);
  });

  it('should report invalid values by field', () => {
    const result = loadServerConfig({ port: 'abc', path: 'sync' }, {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^port: /);
      expect(result.error).toContain('; path: ');
    }
  });

  it('should reject unknown log levels', () => {
    const result = loadServerConfig({}, { COMPANION_SYNC_LOG_LEVEL: 'verbose' });

    expect(result.ok === false && result.error).toMatch(/^logLevel: /);
  });
});

describe('toServerConfig', () => {
  it('should map settings onto the server configuration', () => {
    expect(
      toServerConfig({
        port: 1,
        host: 'h',
        path: '/p',
        logLevel: 'warn',
        offlineQueueLimit: 2,
        clientTimeout: 3,
        maxClockSkewMs: 4,
      })
    ).toEqual({
      port: 1,
      host: 'h',
      path: '/p',
      logging: 'warn',
      offlineQueueLimit: 2,
      clientTimeout: 3,
      sync: { maxClockSkewMs: 4 },
    });
  });
});
