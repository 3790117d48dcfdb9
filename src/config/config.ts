// This module loads and validates runtime configuration from environment variables.

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { SessionPolicy } from '../mcp/session.js';
import { AppError } from '../utils/errors.js';

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  sessionMode: SessionPolicy;
  trustStatelessClients: boolean;
  debugErrors: boolean;
  handlerTimeoutMs: number;
  sessionIdleTtlMs: number;
  stateDbPath: string;
  catalogSeedPath: string;
}

const DEFAULT_SEED_PATH = fileURLToPath(new URL('../../data/projects.json', import.meta.url));

// Environment flags arrive as strings; only explicit truthy spellings enable them.
const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1' || value === 'yes'));

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MCP_SESSION_MODE: z.enum(['stateless', 'persistent']).default('stateless'),
  MCP_TRUST_STATELESS_CLIENTS: booleanFlag(true),
  MCP_DEBUG_ERRORS: booleanFlag(false),
  MCP_HANDLER_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  MCP_SESSION_IDLE_TTL_MS: z.coerce.number().int().min(1000).default(30 * 60 * 1000),
  STATE_DB_PATH: z.string().trim().min(1).default(':memory:'),
  CATALOG_SEED_PATH: z.string().trim().min(1).default(DEFAULT_SEED_PATH)
});

// This function maps the environment into typed config and reports every invalid variable at once.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new AppError(500, 'invalid_config', `Invalid configuration: ${variables.join(', ')}`, parsed.error.flatten());
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    sessionMode: values.MCP_SESSION_MODE,
    trustStatelessClients: values.MCP_TRUST_STATELESS_CLIENTS,
    debugErrors: values.MCP_DEBUG_ERRORS,
    handlerTimeoutMs: values.MCP_HANDLER_TIMEOUT_MS,
    sessionIdleTtlMs: values.MCP_SESSION_IDLE_TTL_MS,
    stateDbPath: values.STATE_DB_PATH,
    catalogSeedPath: values.CATALOG_SEED_PATH
  };
}
