// This module implements the streamable HTTP JSON-RPC endpoint that feeds MCP messages to the dispatcher.

import type { FastifyBaseLogger, FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { ParseError, RPC_ERROR_CODES } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { MCP_SERVER_NAME } from '../version.js';
import { isRecord, rpcError, type Dispatcher } from './dispatcher.js';
import type { Session, SessionManager } from './session.js';

export const SESSION_HEADER = 'mcp-session-id';

const ADVERTISED_METHODS = [
  'initialize',
  'notifications/initialized',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'prompts/list',
  'prompts/get'
];

export interface McpRouteDeps {
  dispatcher: Dispatcher;
  sessions: SessionManager;
}

export interface ParsedEnvelope {
  batch: boolean;
  // Invalid batch members are reported individually instead of failing the whole batch.
  items: Array<JsonRpcRequest | ParseError>;
}

// This helper validates that a payload is structurally a JSON-RPC request or notification.
function toJsonRpcRequest(value: unknown): JsonRpcRequest | ParseError {
  if (!isRecord(value)) {
    return new ParseError('invalid_envelope', 'Invalid JSON-RPC request object.');
  }

  if (value.jsonrpc !== '2.0') {
    return new ParseError('invalid_envelope', 'Invalid JSON-RPC request: jsonrpc must be "2.0".');
  }

  const { id, method, params } = value;
  if (typeof method !== 'string' || method.length === 0) {
    return new ParseError('invalid_envelope', 'Invalid JSON-RPC request: missing method.');
  }

  if (id !== undefined && typeof id !== 'string' && typeof id !== 'number') {
    return new ParseError('invalid_envelope', 'Invalid JSON-RPC request: id must be a string or number.');
  }

  if (params !== undefined && !isRecord(params)) {
    return new ParseError('invalid_envelope', 'Invalid JSON-RPC request: params must be an object.');
  }

  return {
    jsonrpc: '2.0',
    method,
    ...(id !== undefined ? { id } : {}),
    ...(params !== undefined ? { params } : {})
  };
}

// This function turns a raw HTTP body into JSON-RPC requests before any session logic runs.
export function parseEnvelope(raw: string): ParsedEnvelope {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ParseError('invalid_json', 'Parse error: invalid JSON.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }

  if (Array.isArray(payload)) {
    if (payload.length === 0) {
      throw new ParseError('invalid_envelope', 'Invalid JSON-RPC request: empty batch.');
    }
    return { batch: true, items: payload.map(toJsonRpcRequest) };
  }

  const single = toJsonRpcRequest(payload);
  if (single instanceof ParseError) {
    throw single;
  }
  return { batch: false, items: [single] };
}

function readSessionHeader(request: FastifyRequest): string | undefined {
  const value = request.headers[SESSION_HEADER];
  const token = Array.isArray(value) ? value[0] : value;
  return token && token.trim().length > 0 ? token.trim() : undefined;
}

function parseErrorResponse(error: ParseError): JsonRpcResponse {
  return rpcError(null, error.rpcCode, error.message);
}

// This helper aborts in-flight handlers when the client disconnects before the reply is written.
function watchDisconnect(reply: FastifyReply, logger: FastifyBaseLogger): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      logger.warn({ event: 'mcp_client_disconnected' }, 'mcp_client_disconnected');
      controller.abort(new Error('client_disconnected'));
    }
  });
  return controller;
}

// This handler answers body-level failures on POST /mcp (content type, size) as JSON-RPC errors.
function transportErrorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): void {
  const status = error.statusCode ?? 500;

  request.log.warn(
    { event: 'mcp_post_rejected', statusCode: status, code: error.code, error: errorForLog(error) },
    'mcp_post_rejected'
  );

  if (status >= 500) {
    reply.code(500).send(rpcError(null, RPC_ERROR_CODES.INTERNAL_ERROR, 'Internal error.'));
    return;
  }

  const message =
    status === 415 ? 'Unsupported content type; POST /mcp expects application/json.' : `Invalid request: ${error.message}`;
  reply.code(status).send(rpcError(null, RPC_ERROR_CODES.INVALID_REQUEST, message));
}

// This function registers streamable HTTP MCP routes.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  // JSON bodies stay raw so malformed payloads are answered with JSON-RPC parse errors.
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.get('/mcp', async (request) => {
    request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');

    return {
      name: MCP_SERVER_NAME,
      transport: 'streamable-http',
      endpoint: '/mcp',
      sessionMode: deps.sessions.policy,
      methods: ADVERTISED_METHODS
    };
  });

  fastify.post('/mcp', { errorHandler: transportErrorHandler }, async (request: FastifyRequest, reply: FastifyReply) => {
    const requestLogger = request.log.child({ component: 'mcp' });
    const raw = typeof request.body === 'string' ? request.body : '';

    let envelope: ParsedEnvelope;
    try {
      envelope = parseEnvelope(raw);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }

      requestLogger.warn({ event: 'mcp_post_parse_failed', code: error.code, message: error.message }, 'mcp_post_parse_failed');
      reply.code(400).send(parseErrorResponse(error));
      return;
    }

    const session: Session = deps.sessions.getOrCreate(readSessionHeader(request));
    const sessionLogger = requestLogger.child({ sessionId: session.id ?? null });
    const disconnect = watchDisconnect(reply, sessionLogger);

    sessionLogger.info(
      {
        event: envelope.batch ? 'mcp_post_batch_received' : 'mcp_post_single_request_received',
        batchSize: envelope.items.length
      },
      envelope.batch ? 'mcp_post_batch_received' : 'mcp_post_single_request_received'
    );

    const responses: JsonRpcResponse[] = [];
    let retained = false;
    try {
      // Sequential so an initialize and its initialized notification can share one batch.
      for (const item of envelope.items) {
        if (disconnect.signal.aborted) {
          break;
        }

        if (item instanceof ParseError) {
          responses.push(parseErrorResponse(item));
          continue;
        }

        const response = await deps.dispatcher.dispatch(session, item, {
          signal: disconnect.signal,
          logger: sessionLogger
        });
        if (response) {
          responses.push(response);
        }
      }
    } finally {
      // Sessions that never got past uninitialized are not kept, so stray posts cannot grow the session map.
      retained = deps.sessions.retain(session);
      if (!retained) {
        session.close('request_complete');
      }
    }

    if (disconnect.signal.aborted) {
      sessionLogger.warn(
        { event: 'mcp_post_reply_dropped', reason: errorForLog(disconnect.signal.reason) },
        'mcp_post_reply_dropped'
      );
      reply.hijack();
      reply.raw.destroy();
      return;
    }

    if (retained && session.id) {
      reply.header(SESSION_HEADER, session.id);
    }

    if (responses.length === 0) {
      reply.code(202).send();
      return;
    }

    reply.send(envelope.batch ? responses : responses[0]);
  });

  fastify.delete('/mcp', async (request, reply) => {
    if (deps.sessions.policy === 'stateless') {
      reply.code(405).send(rpcError(null, RPC_ERROR_CODES.INVALID_REQUEST, 'Sessions are not persisted in stateless mode.'));
      return;
    }

    const token = readSessionHeader(request);
    if (!token || !deps.sessions.close(token)) {
      reply.code(404).send(rpcError(null, RPC_ERROR_CODES.SESSION_CLOSED, 'Unknown or already closed session.'));
      return;
    }

    reply.code(204).send();
  });

  // This route keeps SSE transport disabled because this service answers with plain JSON.
  fastify.get('/mcp/sse', async (request, reply) => {
    request.log.info({ event: 'mcp_sse_disabled_requested' }, 'mcp_sse_disabled_requested');

    reply.code(410).send({
      error: 'sse_disabled',
      message: 'SSE transport is disabled. Use Streamable HTTP at /mcp.'
    });
  });
}
