// This module wires the MCP protocol core, the catalog store, HTTP routes, and lifecycle resources.

import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from './config/config.js';
import { SqliteProjectStore, loadProjectSeed } from './db/database.js';
import { Dispatcher } from './mcp/dispatcher.js';
import { CapabilityNegotiator } from './mcp/negotiator.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { Registry } from './mcp/registry.js';
import { SessionManager } from './mcp/session.js';
import { buildProjectRegistry } from './mcp/tools.js';
import type { ProjectCatalog } from './types/domain.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION, formatProtocolVersionWithTimestamp } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  registry: Registry;
  sessions: SessionManager;
}

export interface ServerOverrides {
  // Replaces the SQLite-backed catalog, e.g. with an in-process fake.
  catalog?: ProjectCatalog;
  logger?: boolean;
}

const SERVER_INSTRUCTIONS =
  'Project tracker for the IT department. Use list_projects to discover project ids, get_project for details, ' +
  'and the tracker://projects/all resource for the complete catalog.';

// This map stores high-resolution request start times without widening the Fastify request type.
const requestStartTimes = new WeakMap<object, bigint>();

// This helper opens the SQLite catalog and seeds it on first start.
function openCatalog(config: AppConfig): { catalog: ProjectCatalog; close: () => void; seeded: number } {
  const store = new SqliteProjectStore(config.stateDbPath);
  try {
    const seeded = store.seedIfEmpty(loadProjectSeed(config.catalogSeedPath));
    return { catalog: store, close: () => store.close(), seeded };
  } catch (error) {
    store.close();
    throw error;
  }
}

// This function builds and configures the full HTTP application.
export function createServer(config: AppConfig, overrides: ServerOverrides = {}): ServerResources {
  const app = Fastify({
    logger: overrides.logger === false ? false : buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  const opened = overrides.catalog ? null : openCatalog(config);
  const catalog = overrides.catalog ?? opened?.catalog;
  if (!catalog) {
    throw new AppError(500, 'catalog_unavailable', 'No project catalog is configured.');
  }

  if (opened) {
    app.log.info({ event: 'catalog_opened', stateDbPath: config.stateDbPath, seeded: opened.seeded }, 'catalog_opened');
  }

  const registry = buildProjectRegistry(catalog, { handlerTimeoutMs: config.handlerTimeoutMs });
  const negotiator = new CapabilityNegotiator(registry, { instructions: SERVER_INSTRUCTIONS });
  const sessions = new SessionManager({
    policy: config.sessionMode,
    trustStatelessClients: config.trustStatelessClients,
    idleTtlMs: config.sessionIdleTtlMs,
    establishTrusted: (session) => negotiator.establishTrusted(session),
    logger: app.log
  });
  const dispatcher = new Dispatcher({
    registry,
    negotiator,
    logger: app.log,
    debugErrors: config.debugErrors
  });

  app.log.info(
    {
      event: 'mcp_core_ready',
      sessionMode: config.sessionMode,
      trustStatelessClients: config.trustStatelessClients,
      tools: registry.count('tool'),
      resources: registry.count('resource'),
      prompts: registry.count('prompt')
    },
    'mcp_core_ready'
  );

  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  app.get('/health', async (_request, reply) => {
    app.log.debug({ event: 'health_check' }, 'health_check');
    reply.type('text/plain').send('OK');
  });

  app.get('/', async () => {
    return {
      server: MCP_SERVER_NAME,
      status: 'running',
      mcpEndpoint: '/mcp',
      tools: Array.from(registry.list('tool'), (descriptor) => descriptor.name)
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: formatProtocolVersionWithTimestamp()
    };
  });

  registerMcpRoutes(app, { dispatcher, sessions });

  let sweepTimer: NodeJS.Timeout | null = null;
  if (config.sessionMode === 'persistent') {
    sweepTimer = setInterval(() => {
      sessions.sweep();
    }, Math.max(1000, Math.floor(config.sessionIdleTtlMs / 2)));
    sweepTimer.unref();
  }

  // This shutdown hook closes sessions, timers, and the catalog so app close remains deterministic.
  app.addHook('onClose', async () => {
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = null;
    }
    sessions.closeAll();
    opened?.close();
  });

  // This handler maps exceptions that escape routing into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    // Fastify's own client errors (bad content type, oversized body) carry a 4xx statusCode.
    const status = error instanceof AppError ? error.statusCode : (error.statusCode ?? 500);

    reply.status(status).send({
      ok: false,
      error: {
        code: error instanceof AppError ? error.code : (error.code ?? normalized.code),
        message: status >= 500 ? 'Internal server error.' : error.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    registry,
    sessions
  };
}
