import { z } from 'zod';

/** Wire-stable error codes: the JSON-RPC reserved band plus the ACP band. */
export enum AcpErrorCode {
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,

  AGENT_ERROR = -32000,
  TOOL_ERROR = -32001,
  PERMISSION_DENIED = -32002,
  SESSION_NOT_FOUND = -32003,
  SESSION_EXPIRED = -32004,
  UNSUPPORTED_OPERATION = -32005,
}

export type ErrorObject = {
  code: number;
  message: string;
  data?: Record<string, unknown>;
};

/**
 * An error that crosses the protocol boundary as a JSON-RPC error object.
 * Handlers throw these; the engine turns them into Responses with the same code.
 */
export class RequestError extends Error {
  readonly data?: Record<string, unknown>;

  constructor(
    public readonly code: number,
    message: string,
    data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RequestError';
    if (data) {
      this.data = data;
    }
  }

  static parseError(details?: string): RequestError {
    return new RequestError(AcpErrorCode.PARSE_ERROR, 'Parse error', details ? { details } : undefined);
  }

  static invalidRequest(details?: string): RequestError {
    return new RequestError(AcpErrorCode.INVALID_REQUEST, details ? `Invalid request: ${details}` : 'Invalid request');
  }

  static methodNotFound(method: string): RequestError {
    return new RequestError(AcpErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
  }

  static invalidParams(details?: string, data?: Record<string, unknown>): RequestError {
    return new RequestError(AcpErrorCode.INVALID_PARAMS, details ? `Invalid params: ${details}` : 'Invalid params', data);
  }

  static internalError(details?: string, data?: Record<string, unknown>): RequestError {
    return new RequestError(AcpErrorCode.INTERNAL_ERROR, details ? `Internal error: ${details}` : 'Internal error', data);
  }

  static agentError(details: string): RequestError {
    return new RequestError(AcpErrorCode.AGENT_ERROR, `Agent error: ${details}`);
  }

  static toolNotFound(name: string): RequestError {
    return new RequestError(AcpErrorCode.TOOL_ERROR, `Tool not found: ${name}`, { tool: name });
  }

  static permissionDenied(details: string, data?: Record<string, unknown>): RequestError {
    return new RequestError(AcpErrorCode.PERMISSION_DENIED, `Permission denied: ${details}`, data);
  }

  static sessionNotFound(sessionId: string): RequestError {
    return new RequestError(AcpErrorCode.SESSION_NOT_FOUND, `Session not found: ${sessionId}`, { session_id: sessionId });
  }

  static sessionExpired(sessionId: string): RequestError {
    return new RequestError(AcpErrorCode.SESSION_EXPIRED, `Session expired: ${sessionId}`, { session_id: sessionId });
  }

  static unsupportedOperation(details: string): RequestError {
    return new RequestError(AcpErrorCode.UNSUPPORTED_OPERATION, `Unsupported operation: ${details}`);
  }

  /** Rebuilds an error received on the wire (client role). */
  static fromObject(error: ErrorObject): RequestError {
    return new RequestError(error.code, error.message, error.data);
  }

  toObject(): ErrorObject {
    return this.data
      ? { code: this.code, message: this.message, data: this.data }
      : { code: this.code, message: this.message };
  }
}

/** Raised on the client side when no Response arrives before the deadline. */
export class RequestTimeoutError extends Error {
  constructor(
    public readonly method: string,
    public readonly requestId: number,
    public readonly timeoutMs: number,
  ) {
    super(`Request timeout for ${method} (id ${requestId}) after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class ConnectionClosedError extends Error {
  constructor(message = 'Connection closed') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

/**
 * Converts anything a handler threw into a wire error object.
 * Unexpected errors keep only their message text.
 */
export function toErrorObject(error: unknown): ErrorObject {
  if (error instanceof RequestError) {
    return error.toObject();
  }

  if (error instanceof z.ZodError) {
    return RequestError.invalidParams(
      error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; '),
      { issues: error.format() },
    ).toObject();
  }

  let details: string | undefined;
  if (error instanceof Error) {
    details = error.message;
  } else if (
    typeof error === 'object' &&
    error != null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    details = error.message;
  } else if (error !== undefined) {
    details = String(error);
  }

  return RequestError.internalError(details).toObject();
}
