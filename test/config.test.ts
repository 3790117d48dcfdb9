// This test suite verifies environment parsing into the typed runtime configuration.

import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/config.js';
import { AppError } from '../src/utils/errors.js';

describe('config', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      host: '0.0.0.0',
      port: 8000,
      logLevel: 'info',
      sessionMode: 'stateless',
      trustStatelessClients: true,
      debugErrors: false,
      handlerTimeoutMs: 0,
      sessionIdleTtlMs: 1_800_000,
      stateDbPath: ':memory:'
    });
    expect(config.catalogSeedPath.endsWith('projects.json')).toBe(true);
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      HOST: '127.0.0.1',
      PORT: '9100',
      LOG_LEVEL: 'debug',
      MCP_SESSION_MODE: 'persistent',
      MCP_TRUST_STATELESS_CLIENTS: 'no',
      MCP_DEBUG_ERRORS: '1',
      MCP_HANDLER_TIMEOUT_MS: '2500',
      MCP_SESSION_IDLE_TTL_MS: '60000',
      STATE_DB_PATH: '/tmp/tracker/state.db',
      CATALOG_SEED_PATH: '/tmp/tracker/seed.json'
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 9100,
      logLevel: 'debug',
      sessionMode: 'persistent',
      trustStatelessClients: false,
      debugErrors: true,
      handlerTimeoutMs: 2500,
      sessionIdleTtlMs: 60000,
      stateDbPath: '/tmp/tracker/state.db',
      catalogSeedPath: '/tmp/tracker/seed.json'
    });
  });

  it('names every invalid variable', () => {
    try {
      loadConfig({ PORT: 'eighty', MCP_SESSION_MODE: 'sticky', MCP_DEBUG_ERRORS: 'maybe' });
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: 'invalid_config',
        message: 'Invalid configuration: PORT, MCP_SESSION_MODE, MCP_DEBUG_ERRORS'
      });
    }
  });
});
