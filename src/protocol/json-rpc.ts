import { RequestError, toErrorObject, type ErrorObject } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import { encodeFrame } from './ndjson.js';
import {
  JSONRPC_VERSION,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type Params,
  type RequestId,
} from './types.js';

// ========== ENVELOPE CLASSIFICATION ==========

export type ParsedMessage =
  | { kind: 'request'; message: JsonRpcRequest }
  | { kind: 'notification'; message: JsonRpcNotification }
  | { kind: 'response'; message: JsonRpcResponse }
  | { kind: 'invalid'; id: RequestId | null; reason: string; notification: boolean }
  | { kind: 'invalid-response'; id: RequestId | null; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRequestId(value: unknown): value is RequestId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isInteger(value));
}

function isErrorObject(value: unknown): value is ErrorObject {
  return (
    isRecord(value) &&
    typeof value.code === 'number' &&
    typeof value.message === 'string' &&
    (value.data === undefined || isRecord(value.data))
  );
}

/**
 * Classifies a decoded JSON value as a Request, Notification or Response.
 * Anything structurally wrong comes back as `invalid`, keyed to its id when
 * the id itself is usable. A broken Response is `invalid-response`: it is
 * never answered.
 */
export function parseMessage(value: unknown): ParsedMessage {
  if (!isRecord(value)) {
    return { kind: 'invalid', id: null, reason: 'message must be a JSON object', notification: false };
  }

  const hasId = 'id' in value;
  const id = hasId && isRequestId(value.id) ? value.id : null;
  const notification = !hasId;
  const invalid = (reason: string): ParsedMessage => ({ kind: 'invalid', id, reason, notification });

  if (value.jsonrpc !== JSONRPC_VERSION) {
    return invalid('jsonrpc must be "2.0"');
  }

  if (!('method' in value) && hasId && ('result' in value || 'error' in value)) {
    const invalidResponse = (reason: string): ParsedMessage => ({ kind: 'invalid-response', id, reason });
    if (id === null) return invalidResponse('id must be a string or an integer');
    if ('error' in value) {
      if ('result' in value) return invalidResponse('response carries both result and error');
      if (!isErrorObject(value.error)) return invalidResponse('malformed error object');
      return { kind: 'response', message: { jsonrpc: JSONRPC_VERSION, id, error: value.error } };
    }
    return { kind: 'response', message: { jsonrpc: JSONRPC_VERSION, id, result: value.result } };
  }

  if (typeof value.method !== 'string') {
    return invalid('method must be a string');
  }
  if ('params' in value && value.params !== undefined && !isRecord(value.params)) {
    return invalid('params must be an object');
  }
  if (hasId && id === null) {
    return invalid('id must be a string or an integer');
  }

  const params = isRecord(value.params) ? value.params : undefined;
  const base = params ? { method: value.method, params } : { method: value.method };
  if (id === null) {
    return { kind: 'notification', message: { jsonrpc: JSONRPC_VERSION, ...base } };
  }
  return { kind: 'request', message: { jsonrpc: JSONRPC_VERSION, id, ...base } };
}

export function successResponse(id: RequestId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result: result ?? null };
}

export function errorResponse(id: RequestId | null, error: ErrorObject): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

// ========== DISPATCH ==========

/** The remote end a handler is serving; used to push notifications back. */
export interface Peer {
  readonly id: string;
  sendNotification(method: string, params?: Params): Promise<void>;
}

export type HandlerContext = {
  peer: Peer;
};

export type RequestHandler = (params: Params, ctx: HandlerContext) => unknown;
export type NotificationHandler = (params: Params, ctx: HandlerContext) => void | Promise<void>;

export interface JsonRpcEngineOptions {
  logger?: Logger;
}

/**
 * Inbound side of a JSON-RPC peer: turns one raw frame into at most one raw
 * reply. Requests and Notifications are looked up in separate tables.
 * Responses belong to the peer that sent the Request and are not handled here.
 */
export class JsonRpcEngine {
  private readonly log: Logger;
  private readonly requestHandlers = new Map<string, RequestHandler>();
  private readonly notificationHandlers = new Map<string, NotificationHandler>();

  constructor({ logger }: JsonRpcEngineOptions = {}) {
    this.log = logger ?? createLogger('rpc');
  }

  registerRequestHandler(method: string, handler: RequestHandler): this {
    this.requestHandlers.set(method, handler);
    return this;
  }

  registerNotificationHandler(method: string, handler: NotificationHandler): this {
    this.notificationHandlers.set(method, handler);
    return this;
  }

  get methods(): string[] {
    return [...this.requestHandlers.keys()];
  }

  /** Decodes, dispatches and encodes. Returns the reply frame, or undefined when none is due. */
  async process(raw: string, ctx: HandlerContext): Promise<string | undefined> {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      this.log.warn('rpc.parse.error', { linePreview: raw.slice(0, 120), error: errorMessage(error) });
      return encodeFrame(errorResponse(null, RequestError.parseError(errorMessage(error)).toObject()));
    }
    const response = await this.handle(parseMessage(value), ctx);
    return response ? encodeFrame(response) : undefined;
  }

  async handle(parsed: ParsedMessage, ctx: HandlerContext): Promise<JsonRpcResponse | undefined> {
    switch (parsed.kind) {
      case 'invalid':
        if (parsed.notification) {
          this.log.warn('rpc.notification.invalid', { reason: parsed.reason });
          return undefined;
        }
        this.log.warn('rpc.request.invalid', { id: parsed.id, reason: parsed.reason });
        return errorResponse(parsed.id, RequestError.invalidRequest(parsed.reason).toObject());
      case 'request':
        return this.handleRequest(parsed.message, ctx);
      case 'notification':
        await this.handleNotification(parsed.message, ctx);
        return undefined;
      case 'response':
        this.log.debug('rpc.response.unrouted', { id: parsed.message.id });
        return undefined;
      case 'invalid-response':
        this.log.warn('rpc.response.invalid', { id: parsed.id, reason: parsed.reason });
        return undefined;
    }
  }

  private async handleRequest(request: JsonRpcRequest, ctx: HandlerContext): Promise<JsonRpcResponse> {
    const handler = this.requestHandlers.get(request.method);
    if (!handler) {
      this.log.debug('rpc.method.unknown', { method: request.method, id: request.id });
      return errorResponse(request.id, RequestError.methodNotFound(request.method).toObject());
    }

    const started = Date.now();
    try {
      const result = await handler(request.params ?? {}, ctx);
      this.log.debug('rpc.request.ok', { method: request.method, id: request.id, ms: Date.now() - started });
      return successResponse(request.id, result);
    } catch (error) {
      const wire = toErrorObject(error);
      if (error instanceof RequestError) {
        this.log.debug('rpc.request.failed', { method: request.method, id: request.id, code: wire.code });
      } else {
        this.log.error('rpc.handler.error', {
          method: request.method,
          id: request.id,
          code: wire.code,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
      return errorResponse(request.id, wire);
    }
  }

  private async handleNotification(notification: JsonRpcNotification, ctx: HandlerContext) {
    const handler = this.notificationHandlers.get(notification.method);
    if (!handler) {
      this.log.debug('rpc.notification.unhandled', { method: notification.method });
      return;
    }
    try {
      await handler(notification.params ?? {}, ctx);
    } catch (error) {
      this.log.error('rpc.notification.error', { method: notification.method, error: errorMessage(error) });
    }
  }
}
