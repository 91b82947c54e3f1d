import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { z } from 'zod';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import { Connection } from '../protocol/connection.js';
import { StreamChannel, WebSocketChannel, type FrameChannel, type MessageSocket } from '../protocol/io.js';
import { JsonRpcEngine } from '../protocol/json-rpc.js';
import {
  PROTOCOL_VERSION,
  SESSION_UPDATE_METHOD,
  initializeResultSchema,
  promptResultSchema,
  sessionResultSchema,
  sessionUpdateSchema,
  setModeResultSchema,
  setModelResultSchema,
  successResultSchema,
  toolResultSchema,
  toolsListResultSchema,
  type InitializeParams,
  type NewSessionParams,
  type Params,
  type SessionMode,
} from '../protocol/types.js';

export type SessionUpdate = z.infer<typeof sessionUpdateSchema>;
export type UpdateListener = (update: SessionUpdate) => void;

export interface AcpClientOptions {
  requestTimeoutMs?: number;
  logger?: Logger;
}

export interface SpawnOptions extends AcpClientOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface PromptOptions {
  mode?: SessionMode;
  model?: string;
  metadata?: Record<string, unknown>;
  timeoutMs?: number;
}

/**
 * Client role of the protocol: typed helpers over a Connection whose
 * engine serves no methods. `session/update` notifications reach `onUpdate`
 * listeners.
 */
export class AcpClient {
  readonly connection: Connection;
  private readonly log: Logger;
  private readonly listeners = new Set<UpdateListener>();
  private child: ChildProcessByStdio<Writable, Readable, null> | undefined;

  constructor(channel: FrameChannel, options: AcpClientOptions = {}) {
    this.log = options.logger ?? createLogger('client');
    this.connection = new Connection(channel, new JsonRpcEngine({ logger: this.log }), {
      logger: this.log,
      requestTimeoutMs: options.requestTimeoutMs,
    });
    this.connection.onNotification((method, params) => {
      if (method !== SESSION_UPDATE_METHOD) return;
      const update = sessionUpdateSchema.safeParse(params);
      if (!update.success) {
        this.log.warn('client.update.invalid', { issues: update.error.issues.length });
        return;
      }
      for (const listener of this.listeners) listener(update.data);
    });
  }

  /** Talks to a gateway whose stdout is `input` and stdin is `output`. */
  static fromStreams(input: Readable, output: Writable, options: AcpClientOptions = {}): AcpClient {
    return new AcpClient(new StreamChannel(input, output, options.logger), options);
  }

  static fromSocket(socket: MessageSocket, options: AcpClientOptions = {}): AcpClient {
    return new AcpClient(new WebSocketChannel(socket, options.logger), options);
  }

  /** Starts a gateway subprocess in stdio mode and connects to it. */
  static spawn(command: string, args: readonly string[] = [], options: SpawnOptions = {}): AcpClient {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'inherit'],
    });
    const client = AcpClient.fromStreams(child.stdout, child.stdin, options);
    client.child = child;
    child.on('error', (error) => {
      client.log.error('client.child.error', { command, error: errorMessage(error) });
      client.close();
    });
    child.on('exit', (code, signal) => {
      client.log.debug('client.child.exit', { command, code, signal });
      client.connection.close();
    });
    return client;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  onUpdate(listener: UpdateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    params: Params | undefined,
    schema: S,
    timeoutMs?: number,
  ): Promise<z.infer<S>> {
    const result = await this.connection.sendRequest(method, params, { timeoutMs });
    return schema.parse(result);
  }

  initialize(params: InitializeParams = {}) {
    return this.request('initialize', { protocol_version: PROTOCOL_VERSION, ...params }, initializeResultSchema);
  }

  newSession(params: NewSessionParams = {}) {
    return this.request('session/new', params, sessionResultSchema);
  }

  prompt(sessionId: string, message: string, options: PromptOptions = {}) {
    const { timeoutMs, ...overrides } = options;
    return this.request('session/prompt', { session_id: sessionId, message, ...overrides }, promptResultSchema, timeoutMs);
  }

  setMode(sessionId: string, mode: SessionMode) {
    return this.request('session/set_mode', { session_id: sessionId, mode }, setModeResultSchema);
  }

  setModel(sessionId: string, model: string) {
    return this.request('session/set_model', { session_id: sessionId, model }, setModelResultSchema);
  }

  cancel(sessionId: string) {
    return this.request('session/cancel', { session_id: sessionId }, successResultSchema);
  }

  /** Fire-and-forget cancel; reaches the gateway even while a prompt is being processed. */
  cancelNotification(sessionId: string): Promise<void> {
    return this.connection.sendNotification('session/cancel', { session_id: sessionId });
  }

  listTools() {
    return this.request('tools/list', undefined, toolsListResultSchema);
  }

  callTool(name: string, args: Record<string, unknown> = {}, sessionId?: string) {
    return this.request(
      'tools/call',
      sessionId ? { name, arguments: args, session_id: sessionId } : { name, arguments: args },
      toolResultSchema,
    );
  }

  close() {
    this.connection.close();
    if (this.child && this.child.exitCode === null && !this.child.killed) {
      this.child.kill();
    }
  }
}
