// This module provides the typed application errors that are mapped into JSON-RPC and HTTP responses.

import type { DescriptorCategory } from '../types/mcp.js';

// Stable JSON-RPC codes, one per error kind.
export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  HANDLER_EXECUTION: -32000,
  NOT_INITIALIZED: -32002,
  SESSION_CLOSED: -32003,
  NOT_FOUND: -32004,
  HANDLER_TIMEOUT: -32008,
  DUPLICATE_NAME: -32009
} as const;

export type RpcErrorCode = (typeof RPC_ERROR_CODES)[keyof typeof RPC_ERROR_CODES];

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly rpcCode: RpcErrorCode;

  public constructor(
    statusCode: number,
    code: string,
    message: string,
    details?: unknown,
    rpcCode: RpcErrorCode = statusCode >= 500 ? RPC_ERROR_CODES.INTERNAL_ERROR : RPC_ERROR_CODES.INVALID_REQUEST
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.rpcCode = rpcCode;
  }
}

export type ParseFailure = 'invalid_json' | 'invalid_envelope';

// Raised before any session logic when the envelope cannot be used.
export class ParseError extends AppError {
  public constructor(reason: ParseFailure, message: string, details?: unknown) {
    super(
      400,
      reason === 'invalid_json' ? 'parse_error' : 'invalid_request',
      message,
      details,
      reason === 'invalid_json' ? RPC_ERROR_CODES.PARSE_ERROR : RPC_ERROR_CODES.INVALID_REQUEST
    );
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(400, 'invalid_request', message, details, RPC_ERROR_CODES.INVALID_REQUEST);
    this.name = 'InvalidRequestError';
  }
}

export class NotInitializedError extends AppError {
  public constructor(method: string) {
    super(
      409,
      'not_initialized',
      `Session is not initialized; "${method}" requires a completed initialize handshake.`,
      undefined,
      RPC_ERROR_CODES.NOT_INITIALIZED
    );
    this.name = 'NotInitializedError';
  }
}

export class SessionClosedError extends AppError {
  public constructor(sessionId?: string) {
    super(
      410,
      'session_closed',
      sessionId ? `Session ${sessionId} is closed.` : 'Session is closed.',
      undefined,
      RPC_ERROR_CODES.SESSION_CLOSED
    );
    this.name = 'SessionClosedError';
  }
}

export class MethodNotFoundError extends AppError {
  public constructor(method: string) {
    super(404, 'method_not_found', `Unknown method: ${method}`, undefined, RPC_ERROR_CODES.METHOD_NOT_FOUND);
    this.name = 'MethodNotFoundError';
  }
}

export class NotFoundError extends AppError {
  public readonly category: DescriptorCategory;

  public constructor(category: DescriptorCategory, name: string) {
    super(404, `${category}_not_found`, `Unknown ${category}: ${name}`, { category, name }, RPC_ERROR_CODES.NOT_FOUND);
    this.name = 'NotFoundError';
    this.category = category;
  }
}

export class DuplicateNameError extends AppError {
  public constructor(category: DescriptorCategory, name: string) {
    super(
      409,
      'duplicate_name',
      `A ${category} named "${name}" is already registered.`,
      { category, name },
      RPC_ERROR_CODES.DUPLICATE_NAME
    );
    this.name = 'DuplicateNameError';
  }
}

export class InvalidParamsError extends AppError {
  public readonly field: string;

  public constructor(field: string, message: string, details?: unknown) {
    super(400, 'validation_error', message, { field, issues: details }, RPC_ERROR_CODES.INVALID_PARAMS);
    this.name = 'InvalidParamsError';
    this.field = field;
  }
}

export class HandlerExecutionError extends AppError {
  public constructor(category: DescriptorCategory, name: string, cause: unknown) {
    super(500, 'handler_failed', `The ${category} "${name}" failed to execute.`, undefined, RPC_ERROR_CODES.HANDLER_EXECUTION);
    this.name = 'HandlerExecutionError';
    this.cause = cause;
  }
}

export class HandlerTimeoutError extends AppError {
  public constructor(name: string, timeoutMs: number) {
    super(
      504,
      'handler_timeout',
      `Handler "${name}" did not complete within ${timeoutMs}ms.`,
      { timeoutMs },
      RPC_ERROR_CODES.HANDLER_TIMEOUT
    );
    this.name = 'HandlerTimeoutError';
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
