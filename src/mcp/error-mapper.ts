import { errorMessage } from '../domain/errors.js';
import type { JsonRpcError } from './protocol.js';

// JSON-RPC 2.0 error codes
export enum ErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  // Implementation-defined
  ServerError = -32000
}

/**
 * Error already expressed in protocol terms; the dispatcher forwards it as-is.
 */
export class McpError extends Error {
  readonly code: ErrorCode;
  readonly data?: unknown;

  constructor(code: ErrorCode, message: string, data?: unknown) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
  }

  toJsonRpcError(): JsonRpcError {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export function toJsonRpcError(error: unknown): JsonRpcError {
  if (error instanceof McpError) {
    return error.toJsonRpcError();
  }

  return { code: ErrorCode.ServerError, message: 'Server error', data: errorMessage(error) };
}
