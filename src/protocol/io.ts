import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { RawData, WebSocket } from 'ws';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import { DEFAULT_MAX_BUFFER, NdjsonDecoder } from './ndjson.js';

let channelSeq = 0;

/**
 * A bidirectional frame pipe. Emits `frame` with each complete line, `end`
 * once when the input is exhausted but output may still be written, and
 * `close` once when the pipe is gone. `send` takes an encoded frame.
 */
export abstract class FrameChannel extends EventEmitter {
  readonly id: string;
  protected readonly log: Logger;
  protected readonly decoder: NdjsonDecoder;
  private ended = false;
  private closed = false;

  protected constructor(kind: string, log?: Logger, maxBuffer = DEFAULT_MAX_BUFFER) {
    super();
    this.id = `${kind}-${++channelSeq}`;
    this.log = log ?? createLogger('io');
    this.decoder = new NdjsonDecoder(maxBuffer, this.log);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  onFrame(listener: (frame: string) => void): this {
    return this.on('frame', listener);
  }

  onEnd(listener: () => void): this {
    return this.once('end', listener);
  }

  onClose(listener: () => void): this {
    return this.once('close', listener);
  }

  protected ingest(chunk: string | Uint8Array) {
    for (const frame of this.decoder.feed(chunk)) {
      this.emit('frame', frame);
    }
  }

  protected markEnded() {
    if (this.ended || this.closed) return;
    this.ended = true;
    this.log.debug('io.input.ended', { channel: this.id });
    this.emit('end');
  }

  protected markClosed() {
    if (this.closed) return;
    this.closed = true;
    this.log.debug('io.closed', { channel: this.id });
    this.emit('close');
  }

  abstract send(frame: string): Promise<void>;

  abstract close(): void;
}

/** Frames over a pair of byte streams: stdin/stdout, a child process, or test pipes. */
export class StreamChannel extends FrameChannel {
  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    log?: Logger,
    maxBuffer?: number,
  ) {
    super('stdio', log, maxBuffer);
    input.on('data', (chunk: string | Buffer) => this.ingest(chunk));
    input.on('end', () => this.markEnded());
    input.on('close', () => this.markEnded());
    input.on('error', (err) => this.log.error('io.input.error', { channel: this.id, err: err.message }));
    output.on('error', (err) => this.log.error('io.output.error', { channel: this.id, err: err.message }));
  }

  send(frame: string): Promise<void> {
    if (this.isClosed || this.output.writableEnded || this.output.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.output.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  close() {
    this.input.removeAllListeners('data');
    if (this.input !== process.stdin) this.input.destroy();
    this.markClosed();
  }
}

/**
 * The slice of a message-oriented socket a channel needs. {@link fromWebSocket}
 * builds one from a `ws` socket; tests supply their own.
 */
export interface MessageSocket {
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
  onMessage(listener: (data: string) => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(new Uint8Array(data)).toString('utf8');
  return data.toString('utf8');
}

export function fromWebSocket(ws: WebSocket): MessageSocket {
  return {
    send: (data) =>
      new Promise((resolve, reject) => {
        ws.send(data, (err) => (err ? reject(err) : resolve()));
      }),
    close: (code, reason) => ws.close(code, reason),
    onMessage: (listener) => {
      ws.on('message', (data) => listener(rawDataToString(data)));
    },
    onClose: (listener) => {
      ws.on('close', () => listener());
    },
    onError: (listener) => {
      ws.on('error', listener);
    },
  };
}

/** Frames over WebSocket messages; each message boundary also ends a line. */
export class WebSocketChannel extends FrameChannel {
  constructor(
    private readonly socket: MessageSocket,
    log?: Logger,
    maxBuffer?: number,
  ) {
    super('ws', log, maxBuffer);
    socket.onMessage((data) => this.ingest(data.endsWith('\n') ? data : data + '\n'));
    socket.onClose(() => this.markClosed());
    socket.onError((err) => this.log.error('io.ws.error', { channel: this.id, err: err.message }));
  }

  async send(frame: string): Promise<void> {
    if (this.isClosed) return;
    try {
      await this.socket.send(frame);
    } catch (err) {
      this.log.error('io.ws.send.error', { channel: this.id, err: errorMessage(err) });
      throw err;
    }
  }

  close() {
    this.socket.close(1000, 'closing');
    this.markClosed();
  }
}
