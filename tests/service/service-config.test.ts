import { describe, it, expect } from 'vitest';
import { loadServiceConfig } from '../../src/services/service-config.js';
import { ConfigError } from '../../src/services/explorer/errors.js';

function configErrorFor(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadServiceConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadServiceConfig to throw');
}

describe('loadServiceConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadServiceConfig({})).toEqual({
      port: 8080,
      host: '127.0.0.1',
      mountPath: '/api/docs',
      docFile: undefined,
      instanceName: undefined,
      docExpansion: 'list',
      deepLinking: true,
      persistAuthorization: false,
      rateLimitPerMinute: 300,
    });
  });

  it('parses every variable', () => {
    const config = loadServiceConfig({
      EXPLORER_PORT: '9090',
      EXPLORER_HOST: '0.0.0.0',
      EXPLORER_MOUNT_PATH: '/swagger',
      EXPLORER_DOC_FILE: './openapi.json',
      EXPLORER_INSTANCE_NAME: 'petstore',
      EXPLORER_DOC_EXPANSION: 'none',
      EXPLORER_DEEP_LINKING: '0',
      EXPLORER_PERSIST_AUTHORIZATION: 'true',
      EXPLORER_RATE_LIMIT: '60',
    });

    expect(config).toEqual({
      port: 9090,
      host: '0.0.0.0',
      mountPath: '/swagger',
      docFile: './openapi.json',
      instanceName: 'petstore',
      docExpansion: 'none',
      deepLinking: false,
      persistAuthorization: true,
      rateLimitPerMinute: 60,
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadServiceConfig({ PATH: '/usr/bin', HOME: '/root' }).port).toBe(8080);
  });

  it('rejects a non-numeric port', () => {
    const err = configErrorFor({ EXPLORER_PORT: 'eighty' });

    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0].startsWith('EXPLORER_PORT: ')).toBe(true);
  });

  it('rejects a mount path with a trailing slash', () => {
    const err = configErrorFor({ EXPLORER_MOUNT_PATH: '/api/docs/' });
    expect(err.issues).toEqual(['EXPLORER_MOUNT_PATH: must start with "/" and must not end with "/"']);
  });

  it('rejects an unknown doc expansion and a malformed flag together', () => {
    const err = configErrorFor({ EXPLORER_DOC_EXPANSION: 'open', EXPLORER_DEEP_LINKING: 'yes' });

    expect(err.issues).toHaveLength(2);
    expect(err.message.startsWith('Invalid explorer service configuration:\n  - ')).toBe(true);
  });
});
