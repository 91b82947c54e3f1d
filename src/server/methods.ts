import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { AgentEvent, AgentRuntime } from '../agent/runtime.js';
import { RequestError } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import type { HandlerContext, JsonRpcEngine } from '../protocol/json-rpc.js';
import {
  ACP_METHODS,
  PROTOCOL_VERSION,
  SESSION_MODES,
  cancelParamsSchema,
  initializeParamsSchema,
  newSessionParamsSchema,
  promptParamsSchema,
  setModeParamsSchema,
  setModelParamsSchema,
  toolCallParamsSchema,
  type AcpMethod,
  type AgentCapabilities,
  type DeclaredCapabilities,
  type InitializeResult,
  type Params,
  type PromptResult,
  type ServerInfo,
  type SessionResult,
  type ToolResult,
} from '../protocol/types.js';
import type { Session, SessionManager } from '../session/SessionManager.js';
import { StreamingNotifier } from '../streaming/StreamingNotifier.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';

export const SERVER_INFO: ServerInfo = { name: 'acp-gateway', version: '0.1.0' };

export const SERVER_CAPABILITIES: AgentCapabilities = {
  prompt: { image: false, embedded_context: true },
  fs: {
    read_text_file: true,
    write_text_file: true,
    list_directory: false,
    create_directory: false,
    delete_file: false,
  },
  terminal: { create: true, resize: true, send_input: true, read_output: true },
};

/**
 * Flag-wise AND of the server's capabilities with the client's. A group the
 * client leaves out keeps the server's flags; a flag left out of a declared
 * group is off.
 */
export function intersectCapabilities(server: AgentCapabilities, declared?: DeclaredCapabilities): AgentCapabilities {
  if (!declared) return structuredClone(server);
  const pick = <T extends Record<string, boolean>>(ours: T, theirs: Record<string, unknown> | undefined): T => {
    const out = { ...ours };
    if (!theirs) return out;
    for (const key of Object.keys(out)) {
      Object.assign(out, { [key]: ours[key] === true && theirs[key] === true });
    }
    return out;
  };
  return {
    prompt: pick(server.prompt, declared.prompt),
    fs: pick(server.fs, declared.fs),
    terminal: pick(server.terminal, declared.terminal),
  };
}

export interface AcpMethodsOptions {
  sessions: SessionManager;
  runtime: AgentRuntime;
  tools: ToolRegistry;
  workingDirectory: string;
  availableModels: string[];
  defaultModel?: string;
  strictProtocolVersion?: boolean;
  serverInfo?: ServerInfo;
  capabilities?: AgentCapabilities;
  logger?: Logger;
}

type Turn = {
  abort: AbortController;
  notifier: StreamingNotifier;
};

/**
 * The ACP method table. One instance is shared by every connection of a
 * gateway; per-turn state is keyed by session id.
 */
export class AcpMethods {
  private readonly sessions: SessionManager;
  private readonly runtime: AgentRuntime;
  private readonly tools: ToolRegistry;
  private readonly logger: Logger;
  private readonly turns = new Map<string, Turn>();
  private readonly serverInfo: ServerInfo;
  private readonly capabilities: AgentCapabilities;
  private initializedFlag = false;

  constructor(private readonly options: AcpMethodsOptions) {
    this.sessions = options.sessions;
    this.runtime = options.runtime;
    this.tools = options.tools;
    this.logger = options.logger ?? createLogger('methods');
    this.serverInfo = options.serverInfo ?? SERVER_INFO;
    this.capabilities = options.capabilities ?? SERVER_CAPABILITIES;

    this.sessions.onRemoved((session, reason) => {
      this.turns.get(session.sessionId)?.abort.abort();
      this.runtime.dropContext(session.sessionId);
      this.logger.debug('session.context.released', { sessionId: session.sessionId, reason });
    });
  }

  get initialized(): boolean {
    return this.initializedFlag;
  }

  /** Sessions with a prompt turn in flight. */
  get runningTurns(): number {
    return this.turns.size;
  }

  /** Registers every ACP method, plus `session/cancel` as a notification. */
  register(engine: JsonRpcEngine): JsonRpcEngine {
    for (const method of ACP_METHODS) {
      engine.registerRequestHandler(method, (params, ctx) => this.dispatch(method, params, ctx));
    }
    engine.registerNotificationHandler('session/cancel', async (params) => {
      const { session_id } = cancelParamsSchema.parse(params);
      await this.cancel(session_id);
    });
    return engine;
  }

  async dispatch(method: AcpMethod, params: Params, ctx: HandlerContext): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.initialize(params);
      case 'session/new':
        return this.newSession(params);
      case 'session/prompt':
        return this.prompt(params, ctx);
      case 'session/set_mode': {
        const { session_id, mode } = setModeParamsSchema.parse(params);
        this.sessions.require(session_id);
        this.sessions.update(session_id, { mode });
        this.logger.info('session.mode.set', { sessionId: session_id, mode });
        return { success: true, mode };
      }
      case 'session/set_model': {
        const { session_id, model } = setModelParamsSchema.parse(params);
        this.sessions.require(session_id);
        this.sessions.update(session_id, { model });
        this.logger.info('session.model.set', { sessionId: session_id, model });
        return { success: true, model };
      }
      case 'session/cancel': {
        const { session_id } = cancelParamsSchema.parse(params);
        return this.cancel(session_id);
      }
      case 'tools/list':
        return { tools: this.tools.list() };
      case 'tools/call':
        return this.callTool(params);
    }
  }

  private initialize(params: Params): InitializeResult {
    const init = initializeParamsSchema.parse(params);
    if (init.protocol_version && init.protocol_version !== PROTOCOL_VERSION) {
      this.logger.warn('initialize.version.mismatch', { client: init.protocol_version, server: PROTOCOL_VERSION });
      if (this.options.strictProtocolVersion) {
        throw RequestError.unsupportedOperation(
          `protocol version ${init.protocol_version} (server speaks ${PROTOCOL_VERSION})`,
        );
      }
    }
    if (!this.initializedFlag) {
      this.logger.info('initialize', { client: init.client_info, protocolVersion: init.protocol_version });
    }
    this.initializedFlag = true;
    return {
      protocol_version: PROTOCOL_VERSION,
      capabilities: intersectCapabilities(this.capabilities, init.capabilities),
      server_info: { ...this.serverInfo },
    };
  }

  private async newSession(params: Params): Promise<SessionResult> {
    const request = newSessionParamsSchema.parse(params);
    const workingDirectory = request.working_directory
      ? resolve(this.options.workingDirectory, request.working_directory)
      : this.options.workingDirectory;

    let isDirectory = false;
    try {
      isDirectory = (await stat(workingDirectory)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) {
      throw RequestError.invalidParams(`working_directory is not an existing directory: ${workingDirectory}`, {
        working_directory: workingDirectory,
      });
    }

    const session = this.sessions.create(workingDirectory, {
      metadata: request.metadata,
      mode: request.mode,
      model: request.model ?? this.options.defaultModel,
    });

    try {
      await this.runtime.createContext({
        sessionId: session.sessionId,
        workingDirectory,
        metadata: session.metadata,
      });
    } catch (error) {
      this.sessions.delete(session.sessionId);
      throw RequestError.agentError(`failed to prepare agent context: ${errorMessage(error)}`);
    }

    return {
      session_id: session.sessionId,
      working_directory: session.workingDirectory,
      mode: session.mode,
      model: session.model,
      capabilities: structuredClone(this.capabilities),
      available_models: [...this.options.availableModels],
      available_modes: [...SESSION_MODES],
    };
  }

  private async prompt(params: Params, ctx: HandlerContext): Promise<PromptResult> {
    const request = promptParamsSchema.parse(params);
    const sessionId = request.session_id;
    const session = this.sessions.require(sessionId);
    if (this.turns.has(sessionId)) {
      throw RequestError.unsupportedOperation(`a prompt is already running for session ${sessionId}`);
    }

    this.sessions.update(sessionId, {
      ...(request.mode ? { mode: request.mode } : {}),
      ...(request.model ? { model: request.model } : {}),
      ...(request.metadata ? { metadata: { ...session.metadata, ...request.metadata } } : {}),
      messageCount: session.messageCount + 1,
    });

    const turn: Turn = {
      abort: new AbortController(),
      notifier: new StreamingNotifier(ctx.peer, sessionId, this.logger.child('streaming')),
    };
    this.turns.set(sessionId, turn);
    const release = this.sessions.lease(sessionId);
    const started = Date.now();
    this.logger.info('prompt.start', { sessionId, mode: session.mode, model: session.model });

    try {
      const done = await this.drive(session, request.message, turn);
      if (turn.abort.signal.aborted) {
        await turn.notifier.cancel();
        return this.promptResult(done?.content ?? '', 'user_stop', done?.usage);
      }

      const result = this.promptResult(done?.content ?? '', done?.stopReason ?? 'completion', done?.usage);
      await turn.notifier.complete(result);
      this.logger.info('prompt.done', { sessionId, stopReason: result.stop_reason, ms: Date.now() - started });
      return result;
    } catch (error) {
      if (turn.abort.signal.aborted) {
        await turn.notifier.cancel();
        return this.promptResult('', 'user_stop');
      }
      this.logger.error('prompt.failed', { sessionId, error: errorMessage(error) });
      await turn.notifier.error(errorMessage(error));
      if (error instanceof RequestError) throw error;
      throw RequestError.agentError(errorMessage(error));
    } finally {
      this.turns.delete(sessionId);
      release();
    }
  }

  private async drive(
    session: Session,
    message: string,
    turn: Turn,
  ): Promise<Extract<AgentEvent, { type: 'done' }> | undefined> {
    const events = this.runtime.run(
      {
        sessionId: session.sessionId,
        message,
        mode: session.mode,
        model: session.model,
        workingDirectory: session.workingDirectory,
      },
      turn.abort.signal,
    );

    for await (const event of events) {
      if (turn.abort.signal.aborted && event.type !== 'done') break;
      switch (event.type) {
        case 'message':
          await turn.notifier.message({ role: 'assistant', content: [{ type: 'text', text: event.content }] });
          break;
        case 'tool_call':
          this.sessions.update(session.sessionId, { toolCallCount: session.toolCallCount + 1 });
          await turn.notifier.toolCall({ id: event.id, name: event.name, arguments: event.arguments });
          break;
        case 'tool_result':
          await turn.notifier.toolResult({
            toolCallId: event.id,
            name: event.name,
            content: event.content,
            isError: event.isError,
          });
          break;
        case 'error':
          await turn.notifier.error(event.error);
          break;
        case 'done':
          return event;
      }
    }
    return undefined;
  }

  private promptResult(text: string, stopReason: PromptResult['stop_reason'], usage?: PromptResult['usage']): PromptResult {
    const result: PromptResult = {
      message: { role: 'assistant', content: [{ type: 'text', text }] },
      stop_reason: stopReason,
    };
    if (usage) result.usage = usage;
    return result;
  }

  /**
   * Ends a session: aborts its running turn (which then answers `user_stop`),
   * drops the agent context and deletes the session.
   */
  async cancel(sessionId: string): Promise<{ success: true }> {
    const session = this.sessions.require(sessionId);
    this.sessions.update(sessionId, { active: false });

    const turn = this.turns.get(sessionId);
    if (turn) {
      await turn.notifier.cancel();
      turn.abort.abort();
    }
    this.sessions.delete(session.sessionId);
    this.logger.info('session.cancelled', { sessionId, hadTurn: turn !== undefined });
    return { success: true };
  }

  private async callTool(params: Params): Promise<ToolResult> {
    const request = toolCallParamsSchema.parse(params);
    if (!this.tools.has(request.name)) {
      throw RequestError.toolNotFound(request.name);
    }
    const session = request.session_id ? this.sessions.require(request.session_id) : undefined;

    const result = await this.tools.call(request.name, request.arguments, {
      sessionId: session?.sessionId,
      workingDirectory: session?.workingDirectory,
      mode: session?.mode,
    });
    if (session) {
      this.sessions.update(session.sessionId, { toolCallCount: session.toolCallCount + 1 });
    }
    return result;
  }
}
