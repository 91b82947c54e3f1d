import type { Readable, Writable } from 'node:stream';
import { OpenAIChatClient, type ChatStreamClient } from '../agent/chat-client.js';
import { OpenAIAgentRuntime } from '../agent/OpenAIAgentRuntime.js';
import type { AgentRuntime } from '../agent/runtime.js';
import type { GatewayConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { PermissionEngine } from '../permissions/engine.js';
import { Connection } from '../protocol/connection.js';
import { StreamChannel, type FrameChannel } from '../protocol/io.js';
import { JsonRpcEngine } from '../protocol/json-rpc.js';
import { SessionManager } from '../session/SessionManager.js';
import { defaultTools } from '../tools/index.js';
import { ToolRegistry } from '../tools/ToolRegistry.js';
import { AcpMethods, SERVER_INFO } from './methods.js';

export type HealthReport = {
  status: 'ok';
  service: string;
  initialized: boolean;
  sessions: {
    active_sessions: number;
    max_sessions: number;
    total_messages: number;
    total_tool_calls: number;
    session_timeout: number;
  };
  connections: number;
};

export interface AcpServerOptions {
  sessions: SessionManager;
  methods: AcpMethods;
  requestTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Binds the method table to transports. Owns the set of live connections;
 * the session registry is shared by all of them.
 */
export class AcpServer {
  readonly engine: JsonRpcEngine;
  readonly sessions: SessionManager;
  readonly methods: AcpMethods;
  private readonly connections = new Set<Connection>();
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number | undefined;

  constructor(options: AcpServerOptions) {
    this.logger = options.logger ?? createLogger('server');
    this.sessions = options.sessions;
    this.methods = options.methods;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.engine = this.methods.register(new JsonRpcEngine({ logger: this.logger.child('rpc') }));
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Starts serving a channel as one JSON-RPC peer. */
  attach(channel: FrameChannel): Connection {
    const connection = new Connection(channel, this.engine, {
      logger: this.logger.child('connection'),
      requestTimeoutMs: this.requestTimeoutMs,
    });
    this.connections.add(connection);
    connection.onClose(() => {
      this.connections.delete(connection);
      this.logger.info('connection.closed', { connection: connection.id, remaining: this.connections.size });
    });
    this.logger.info('connection.opened', { connection: connection.id });
    return connection;
  }

  /** Serves one peer over a pair of streams; resolves once the input ends. */
  serveStdio(input: Readable = process.stdin, output: Writable = process.stdout): Promise<Connection> {
    const connection = this.attach(new StreamChannel(input, output, this.logger.child('io')));
    return new Promise((resolve) => connection.onClose(() => resolve(connection)));
  }

  start(): void {
    this.sessions.start();
  }

  stop(): void {
    for (const connection of [...this.connections]) {
      connection.close();
    }
    this.sessions.stop();
    this.logger.info('server.stopped');
  }

  health(): HealthReport {
    const stats = this.sessions.stats();
    return {
      status: 'ok',
      service: SERVER_INFO.name,
      initialized: this.methods.initialized,
      sessions: {
        active_sessions: stats.activeSessions,
        max_sessions: stats.maxSessions,
        total_messages: stats.totalMessages,
        total_tool_calls: stats.totalToolCalls,
        session_timeout: stats.sessionTimeout,
      },
      connections: this.connections.size,
    };
  }
}

export interface GatewayOverrides {
  runtime?: AgentRuntime;
  chatClient?: ChatStreamClient;
  tools?: ToolRegistry;
  clock?: () => number;
  logger?: Logger;
}

/** Wires a complete gateway from its configuration. */
export function createGateway(config: GatewayConfig, overrides: GatewayOverrides = {}): AcpServer {
  const logger = overrides.logger ?? createLogger('gateway');

  const tools =
    overrides.tools ??
    new ToolRegistry(defaultTools(), {
      permissions: new PermissionEngine(logger.child('permissions')),
      errorHeuristic: config.toolErrorHeuristic,
      defaultWorkingDirectory: config.workingDirectory,
      logger: logger.child('tools'),
    });

  const sessions = new SessionManager({
    sessionTimeoutMs: config.sessionTimeout * 1000,
    maxSessions: config.maxSessions,
    sweepIntervalMs: config.sweepInterval * 1000,
    clock: overrides.clock,
    logger: logger.child('sessions'),
  });

  const runtime =
    overrides.runtime ??
    new OpenAIAgentRuntime(
      overrides.chatClient ??
        new OpenAIChatClient(logger.child('chat'), { apiKey: config.apiKey, baseURL: config.llmBaseUrl }),
      tools,
      { maxSteps: config.maxSteps, logger: logger.child('agent') },
    );

  const methods = new AcpMethods({
    sessions,
    runtime,
    tools,
    workingDirectory: config.workingDirectory,
    availableModels: config.models,
    defaultModel: config.model,
    strictProtocolVersion: config.strictProtocolVersion,
    logger: logger.child('methods'),
  });

  return new AcpServer({
    sessions,
    methods,
    requestTimeoutMs: config.requestTimeout * 1000,
    logger: logger.child('server'),
  });
}
