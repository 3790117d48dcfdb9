// This module routes one JSON-RPC message to the negotiator or a registry entry and packages the outcome.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { ZodError } from 'zod';
import type { JsonRpcError, JsonRpcId, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import {
  AppError,
  HandlerExecutionError,
  InvalidParamsError,
  MethodNotFoundError,
  NotInitializedError,
  RPC_ERROR_CODES,
  SessionClosedError,
  normalizeError
} from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { CapabilityNegotiator } from './negotiator.js';
import {
  projectPrompt,
  projectResource,
  projectTool,
  type HandlerContext,
  type MethodDescriptor,
  type Registry
} from './registry.js';
import type { Session } from './session.js';

// Keys of params that address the descriptor rather than feed its handler.
const ADDRESSING_KEYS = new Set(['name', 'uri', 'arguments', '_meta']);

export interface DispatcherOptions {
  registry: Registry;
  negotiator: CapabilityNegotiator;
  logger: FastifyBaseLogger;
  // Exposes handler failure messages and stacks in error.data.
  debugErrors?: boolean;
}

export interface DispatchOptions {
  // Aborted by the transport when the client goes away.
  signal?: AbortSignal;
  logger?: FastifyBaseLogger;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: '2.0', id, error };
}

// MCP places handler input under params.arguments; flat params are accepted as well.
export function extractArguments(params: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!params) {
    return {};
  }

  if (isRecord(params.arguments)) {
    return params.arguments;
  }

  const args: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (!ADDRESSING_KEYS.has(key)) {
      args[key] = value;
    }
  }
  return args;
}

// This helper converts the first zod issue into an error that names the offending field.
export function invalidParamsFromZod(error: ZodError, label: string): InvalidParamsError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'arguments';
  const reason = issue?.message ?? 'Invalid value';
  return new InvalidParamsError(field, `Invalid params for ${label}: ${field}: ${reason}`, error.flatten());
}

function requireStringParam(params: Record<string, unknown> | undefined, key: string, method: string): string {
  const value = params?.[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidParamsError(key, `${method} requires params.${key} as string.`);
  }
  return value;
}

export class Dispatcher {
  private readonly registry: Registry;
  private readonly negotiator: CapabilityNegotiator;
  private readonly logger: FastifyBaseLogger;
  private readonly debugErrors: boolean;

  public constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.negotiator = options.negotiator;
    this.logger = options.logger;
    this.debugErrors = options.debugErrors ?? false;
  }

  // This method handles one request and returns a response, or null for notifications and dropped replies.
  public async dispatch(session: Session, request: JsonRpcRequest, options: DispatchOptions = {}): Promise<JsonRpcResponse | null> {
    const logger = options.logger ?? this.logger;
    const isNotification = request.id === undefined;
    const requestId = request.id ?? null;
    const rpcTraceId = randomUUID();
    const startedAt = Date.now();
    let signal: AbortSignal | undefined = options.signal;
    let release: (() => void) | undefined;

    logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        sessionId: session.id ?? null,
        sessionState: session.state
      },
      'mcp_rpc_request_received'
    );

    try {
      if (session.state === 'closed') {
        throw new SessionClosedError(session.id);
      }

      const tracked = session.track(request.id, options.signal);
      signal = tracked.signal;
      release = tracked.release;

      const result = await this.route(session, request, signal, logger);

      if (isNotification) {
        return null;
      }

      if (signal.aborted) {
        this.logDropped(logger, rpcTraceId, request, signal);
        return null;
      }

      return { jsonrpc: '2.0', id: requestId, result: result === undefined ? null : result };
    } catch (error) {
      const payload = this.toRpcError(error);
      const appError = normalizeError(error);

      const level = appError.statusCode >= 500 ? 'error' : 'warn';
      logger[level](
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          sessionId: session.id ?? null,
          code: appError.code,
          rpcCode: payload.code,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error instanceof HandlerExecutionError ? error.cause : error),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      if (isNotification) {
        return null;
      }

      if (signal?.aborted) {
        this.logDropped(logger, rpcTraceId, request, signal);
        return null;
      }

      return rpcError(requestId, payload.code, payload.message, payload.data);
    } finally {
      release?.();
      logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  private async route(session: Session, request: JsonRpcRequest, signal: AbortSignal, logger: FastifyBaseLogger): Promise<unknown> {
    const params = request.params;

    switch (request.method) {
      case 'initialize':
        return this.negotiator.initialize(session, params);

      case 'initialized':
      case 'notifications/initialized':
        if (session.state === 'uninitialized') {
          throw new NotInitializedError(request.method);
        }
        this.negotiator.confirm(session);
        logger.info({ event: 'mcp_session_ready', sessionId: session.id ?? null }, 'mcp_session_ready');
        return {};

      case 'notifications/cancelled': {
        const target = params?.requestId;
        const reason = params?.reason;
        if (typeof target === 'string' || typeof target === 'number') {
          const cancelled = session.cancel(target, typeof reason === 'string' ? reason : undefined);
          logger.info({ event: 'mcp_request_cancel', targetRequestId: target, cancelled }, 'mcp_request_cancel');
        }
        return {};
      }

      case 'ping':
        return {};

      default:
        break;
    }

    if (session.state !== 'ready') {
      throw new NotInitializedError(request.method);
    }

    const context: HandlerContext = { signal, sessionId: session.id, requestId: request.id, logger };

    switch (request.method) {
      case 'tools/list':
        return { tools: Array.from(this.registry.list('tool'), projectTool) };

      case 'resources/list':
        return { resources: Array.from(this.registry.list('resource'), projectResource) };

      case 'prompts/list':
        return { prompts: Array.from(this.registry.list('prompt'), projectPrompt) };

      case 'tools/call': {
        const name = requireStringParam(params, 'name', request.method);
        return this.invoke(this.registry.lookup('tool', name), extractArguments(params), context);
      }

      case 'resources/read': {
        const uri = params?.uri;
        const descriptor =
          typeof uri === 'string'
            ? this.registry.lookupResource(uri)
            : this.registry.lookup('resource', requireStringParam(params, 'name', request.method));
        return this.invoke(descriptor, extractArguments(params), context);
      }

      case 'prompts/get': {
        const name = requireStringParam(params, 'name', request.method);
        return this.invoke(this.registry.lookup('prompt', name), extractArguments(params), context);
      }

      default:
        throw new MethodNotFoundError(request.method);
    }
  }

  private async invoke(
    descriptor: MethodDescriptor,
    rawArgs: Record<string, unknown>,
    context: HandlerContext
  ): Promise<unknown> {
    const parsed = descriptor.inputSchema.safeParse(rawArgs);
    if (!parsed.success) {
      throw invalidParamsFromZod(parsed.error, `${descriptor.category} "${descriptor.name}"`);
    }

    context.logger.debug(
      {
        event: 'mcp_handler_invoked',
        category: descriptor.category,
        name: descriptor.name,
        arguments: sanitizeForLog(parsed.data)
      },
      'mcp_handler_invoked'
    );

    try {
      return await descriptor.handler(parsed.data, context);
    } catch (error) {
      // Classified protocol errors keep their own code; anything else is a handler failure.
      if (error instanceof AppError && error.rpcCode !== RPC_ERROR_CODES.INTERNAL_ERROR) {
        throw error;
      }
      throw new HandlerExecutionError(descriptor.category, descriptor.name, error);
    }
  }

  private toRpcError(error: unknown): JsonRpcError {
    const appError = normalizeError(error);

    if (appError instanceof HandlerExecutionError) {
      return {
        code: appError.rpcCode,
        message: appError.message,
        ...(this.debugErrors ? { data: { cause: errorForLog(appError.cause) } } : {})
      };
    }

    if (appError.rpcCode === RPC_ERROR_CODES.INTERNAL_ERROR) {
      return {
        code: appError.rpcCode,
        message: this.debugErrors ? appError.message : 'Internal error.',
        ...(this.debugErrors ? { data: { cause: errorForLog(error) } } : {})
      };
    }

    return {
      code: appError.rpcCode,
      message: appError.message,
      ...(appError.details !== undefined ? { data: appError.details } : {})
    };
  }

  private logDropped(logger: FastifyBaseLogger, rpcTraceId: string, request: JsonRpcRequest, signal: AbortSignal): void {
    logger.warn(
      {
        event: 'mcp_response_dropped',
        rpcTraceId,
        rpcRequestId: request.id ?? null,
        method: request.method,
        reason: errorForLog(signal.reason)
      },
      'mcp_response_dropped'
    );
  }
}
