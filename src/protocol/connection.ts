import { TaskQueue } from '../core/runtime.js';
import { ConnectionClosedError, RequestError, RequestTimeoutError } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import type { FrameChannel } from './io.js';
import { errorResponse, parseMessage, type HandlerContext, type JsonRpcEngine, type Peer } from './json-rpc.js';
import { encodeFrame } from './ndjson.js';
import { JSONRPC_VERSION, type JsonRpcMessage, type JsonRpcRequest, type JsonRpcResponse, type Params } from './types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

type PendingRequest = {
  method: string;
  deadline: number;
  timer: NodeJS.Timeout;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
};

export type NotificationObserver = (method: string, params: Params) => void;

export interface ConnectionOptions {
  logger?: Logger;
  requestTimeoutMs?: number;
  queueCapacity?: number;
}

export interface SendRequestOptions {
  timeoutMs?: number;
}

/**
 * One JSON-RPC peer bound to a frame channel.
 *
 * Inbound Requests run one at a time in arrival order, so Responses leave in
 * request order. Notifications and Responses bypass that queue. Every
 * outbound frame goes through a single promise-chained write queue.
 */
export class Connection implements Peer {
  readonly id: string;
  #channel: FrameChannel;
  #engine: JsonRpcEngine;
  #log: Logger;
  #requests: TaskQueue;
  #pendingResponses = new Map<number, PendingRequest>();
  #nextRequestId = 1;
  #requestTimeoutMs: number;
  #writeQueue: Promise<void> = Promise.resolve();
  #observers = new Set<NotificationObserver>();
  #closeListeners = new Set<() => void>();
  #inputEnded = false;
  #isClosed = false;
  #ctx: HandlerContext;

  constructor(channel: FrameChannel, engine: JsonRpcEngine, options: ConnectionOptions = {}) {
    this.id = channel.id;
    this.#channel = channel;
    this.#engine = engine;
    this.#log = options.logger ?? createLogger('connection');
    this.#requests = new TaskQueue(this.#log, options.queueCapacity);
    this.#requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.#ctx = { peer: this };

    channel.onFrame((frame) => this.#receive(frame));
    channel.onEnd(() => {
      this.#drainAndClose().catch((error: unknown) => {
        this.#log.error('connection.drain.error', { connection: this.id, error: errorMessage(error) });
      });
    });
    channel.onClose(() => this.close());
  }

  get isClosed(): boolean {
    return this.#isClosed;
  }

  get pendingCount(): number {
    return this.#pendingResponses.size;
  }

  #receive(frame: string) {
    if (this.#isClosed || this.#inputEnded) return;

    let value: unknown;
    try {
      value = JSON.parse(frame);
    } catch (error) {
      this.#log.warn('connection.parse.error', { connection: this.id, linePreview: frame.slice(0, 120) });
      const reply = errorResponse(null, RequestError.parseError(errorMessage(error)).toObject());
      this.#enqueue(() => this.#sendMessage(reply));
      return;
    }

    const parsed = parseMessage(value);
    switch (parsed.kind) {
      case 'response':
        this.#handleResponse(parsed.message);
        return;
      case 'invalid-response':
        this.#dropInvalidResponse(parsed.id, parsed.reason);
        return;
      case 'notification':
        for (const observer of this.#observers) {
          try {
            observer(parsed.message.method, parsed.message.params ?? {});
          } catch (error) {
            this.#log.error('connection.observer.error', { method: parsed.message.method, error: errorMessage(error) });
          }
        }
        this.#engine.handle(parsed, this.#ctx).catch((error: unknown) => {
          this.#log.error('connection.notification.error', { error: errorMessage(error) });
        });
        return;
      case 'invalid':
        if (parsed.notification) {
          void this.#engine.handle(parsed, this.#ctx);
          return;
        }
        break;
      case 'request':
        break;
    }

    const id = parsed.kind === 'request' ? parsed.message.id : parsed.id;
    this.#enqueue(
      async () => {
        const response = await this.#engine.handle(parsed, this.#ctx);
        if (response) await this.#sendMessage(response);
      },
      id,
    );
  }

  #enqueue(task: () => Promise<void>, id: string | number | null = null) {
    const accepted = this.#requests.schedule(task);
    if (!accepted && !this.#isClosed) {
      const overloaded = RequestError.internalError('request queue full', { reason: 'overloaded' });
      void this.#sendMessage(errorResponse(id, overloaded.toObject()));
    }
  }

  #handleResponse(response: JsonRpcResponse) {
    const pending = typeof response.id === 'number' ? this.#pendingResponses.get(response.id) : undefined;
    if (!pending || typeof response.id !== 'number') {
      this.#log.debug('connection.response.unmatched', { connection: this.id, id: response.id });
      return;
    }
    clearTimeout(pending.timer);
    this.#pendingResponses.delete(response.id);
    if ('error' in response) {
      pending.reject(RequestError.fromObject(response.error));
    } else {
      pending.resolve(response.result);
    }
  }

  // Never answered; a waiter with the same id fails instead of timing out
  #dropInvalidResponse(id: string | number | null, reason: string) {
    this.#log.warn('connection.response.invalid', { connection: this.id, id, reason });
    const pending = typeof id === 'number' ? this.#pendingResponses.get(id) : undefined;
    if (!pending || typeof id !== 'number') return;
    clearTimeout(pending.timer);
    this.#pendingResponses.delete(id);
    pending.reject(RequestError.internalError(`malformed response to ${pending.method}: ${reason}`));
  }

  /** Sends a Request and resolves with its `result`; rejects with a RequestError, a timeout or on close. */
  sendRequest(method: string, params?: Params, options: SendRequestOptions = {}): Promise<unknown> {
    if (this.#isClosed) {
      return Promise.reject(new ConnectionClosedError());
    }

    const id = this.#nextRequestId++;
    const timeoutMs = options.timeoutMs ?? this.#requestTimeoutMs;
    const result = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.#pendingResponses.delete(id)) {
          this.#log.warn('connection.request.timeout', { connection: this.id, method, id, timeoutMs });
          reject(new RequestTimeoutError(method, id, timeoutMs));
        }
      }, timeoutMs);
      this.#pendingResponses.set(id, { method, deadline: Date.now() + timeoutMs, timer, resolve, reject });
    });

    const request: JsonRpcRequest = params
      ? { jsonrpc: JSONRPC_VERSION, id, method, params }
      : { jsonrpc: JSONRPC_VERSION, id, method };
    void this.#sendMessage(request);
    return result;
  }

  async sendNotification(method: string, params?: Params): Promise<void> {
    if (this.#isClosed) {
      return;
    }
    await this.#sendMessage(params ? { jsonrpc: JSONRPC_VERSION, method, params } : { jsonrpc: JSONRPC_VERSION, method });
  }

  #sendMessage(message: JsonRpcMessage): Promise<void> {
    const content = encodeFrame(message);

    this.#writeQueue = this.#writeQueue
      .then(async () => {
        if (this.#isClosed) return;
        await this.#channel.send(content);
      })
      .catch((error: unknown) => {
        // Write failures never stop the connection
        this.#log.error('connection.write.error', { connection: this.id, error: errorMessage(error) });
      });

    return this.#writeQueue;
  }

  /** Observes every inbound Notification before it is dispatched. Returns an unsubscribe function. */
  onNotification(observer: NotificationObserver): () => void {
    this.#observers.add(observer);
    return () => this.#observers.delete(observer);
  }

  onClose(listener: () => void): void {
    if (this.#isClosed) {
      listener();
      return;
    }
    this.#closeListeners.add(listener);
  }

  /** Resolves once queued Requests are answered and their frames written. */
  async idle(): Promise<void> {
    await this.#requests.idle();
    await this.#writeQueue;
  }

  /** The remote side stopped sending: answer what already arrived, then close. */
  async #drainAndClose() {
    if (this.#isClosed || this.#inputEnded) return;
    this.#inputEnded = true;
    this.#log.debug('connection.input.ended', { connection: this.id });
    await this.idle();
    this.close();
  }

  close() {
    if (this.#isClosed) return;
    this.#isClosed = true;
    const discarded = this.#requests.close();

    for (const [id, pending] of this.#pendingResponses) {
      clearTimeout(pending.timer);
      pending.reject(new ConnectionClosedError(`Connection closed before response to ${pending.method} (id ${id})`));
    }
    this.#pendingResponses.clear();
    this.#channel.close();
    this.#log.debug('connection.closed', { connection: this.id, discarded });

    for (const listener of this.#closeListeners) {
      try {
        listener();
      } catch (error) {
        this.#log.error('connection.close.listener.error', { error: errorMessage(error) });
      }
    }
    this.#closeListeners.clear();
  }
}
