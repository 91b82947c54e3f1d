import { zodToJsonSchema } from 'zod-to-json-schema';
import { RequestError, toErrorObject } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import type { PromptUsage, StopReason } from '../protocol/types.js';
import { TASK_DONE_TOOL } from '../tools/task-done.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';
import type { ChatMessage, ChatStreamClient, ChatTool } from './chat-client.js';
import type { AgentContextInit, AgentEvent, AgentRuntime, AgentTurn } from './runtime.js';

export const DEFAULT_MAX_STEPS = 50;

interface AgentContext {
  sessionId: string;
  workingDirectory: string;
  metadata: Record<string, unknown>;
  messages: ChatMessage[];
  remainingSteps: number;
}

type PendingToolCall = { id: string; name: string; arguments: string };

export interface OpenAIAgentRuntimeOptions {
  maxSteps?: number;
  systemPrompt?: (init: AgentContextInit) => string;
  logger?: Logger;
}

function defaultSystemPrompt(init: AgentContextInit): string {
  return [
    'You are a software engineering agent working through tools.',
    `Working directory: ${init.workingDirectory}`,
    'Use bash_tool to run commands and edit_tool to inspect and change files.',
    'Call task_done once the task is complete and verified.',
  ].join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tool-calling loop over a chat-completions stream. Each step streams one
 * assistant message, runs the tool calls it asked for and feeds their output
 * back, until the model answers without tools, calls `task_done`, or the step
 * budget runs out.
 */
export class OpenAIAgentRuntime implements AgentRuntime {
  private readonly contexts = new Map<string, AgentContext>();
  private readonly log: Logger;
  private readonly maxSteps: number;
  private readonly systemPrompt: (init: AgentContextInit) => string;
  private chatTools: ChatTool[] | undefined;

  constructor(
    private readonly client: ChatStreamClient,
    private readonly tools: ToolRegistry,
    options: OpenAIAgentRuntimeOptions = {},
  ) {
    this.log = options.logger ?? createLogger('agent');
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.systemPrompt = options.systemPrompt ?? defaultSystemPrompt;
  }

  createContext(init: AgentContextInit): void {
    this.buildContext(init);
  }

  private buildContext(init: AgentContextInit): AgentContext {
    const context: AgentContext = {
      ...init,
      messages: [{ role: 'system', content: this.systemPrompt(init) }],
      remainingSteps: this.maxSteps,
    };
    this.contexts.set(init.sessionId, context);
    this.log.debug('agent.context.created', { sessionId: init.sessionId });
    return context;
  }

  dropContext(sessionId: string): void {
    if (this.contexts.delete(sessionId)) {
      this.log.debug('agent.context.dropped', { sessionId });
    }
  }

  hasContext(sessionId: string): boolean {
    return this.contexts.has(sessionId);
  }

  /** Number of chat messages held for a session, system prompt included. */
  historyLength(sessionId: string): number {
    return this.contexts.get(sessionId)?.messages.length ?? 0;
  }

  private toolDefinitions(): ChatTool[] {
    if (!this.chatTools) {
      this.chatTools = this.tools.names.flatMap((name) => {
        const tool = this.tools.get(name);
        if (!tool) return [];
        const parameters: unknown = zodToJsonSchema(tool.schema, { target: 'openApi3', $refStrategy: 'none' });
        return [
          {
            type: 'function' as const,
            function: {
              name: tool.name,
              description: tool.description,
              parameters: isRecord(parameters) ? parameters : { type: 'object', properties: {} },
            },
          },
        ];
      });
    }
    return this.chatTools;
  }

  async *run(turn: AgentTurn, signal: AbortSignal): AsyncIterable<AgentEvent> {
    const context =
      this.contexts.get(turn.sessionId) ??
      this.buildContext({ sessionId: turn.sessionId, workingDirectory: turn.workingDirectory, metadata: {} });

    context.messages.push({ role: 'user', content: turn.message });
    context.remainingSteps = this.maxSteps;
    let lastText = '';

    const usage = (): PromptUsage => ({
      total_messages: context.messages.length,
      remaining_steps: context.remainingSteps,
    });
    const done = (stopReason: StopReason): AgentEvent => ({ type: 'done', content: lastText, stopReason, usage: usage() });

    while (true) {
      if (signal.aborted) {
        yield done('user_stop');
        return;
      }
      if (context.remainingSteps <= 0) {
        this.log.warn('agent.step.limit', { sessionId: turn.sessionId, maxSteps: this.maxSteps });
        yield done('tool_call_limit');
        return;
      }
      context.remainingSteps--;

      let text = '';
      const calls = new Map<number, PendingToolCall>();
      try {
        for await (const delta of this.client.stream({
          model: turn.model,
          messages: context.messages,
          tools: this.toolDefinitions(),
          signal,
        })) {
          if (delta.content) {
            text += delta.content;
            yield { type: 'message', content: delta.content };
          }
          for (const call of delta.toolCalls ?? []) {
            const pending = calls.get(call.index) ?? { id: '', name: '', arguments: '' };
            if (call.id) pending.id = call.id;
            if (call.name) pending.name += call.name;
            if (call.arguments) pending.arguments += call.arguments;
            calls.set(call.index, pending);
          }
        }
      } catch (error) {
        if (signal.aborted) {
          yield done('user_stop');
          return;
        }
        this.log.error('agent.chat.error', { sessionId: turn.sessionId, error: errorMessage(error) });
        throw RequestError.agentError(errorMessage(error));
      }

      if (text) lastText = text;
      const toolCalls = [...calls.entries()]
        .sort(([a], [b]) => a - b)
        .map(([index, call]) => ({ ...call, id: call.id || `call_${context.messages.length}_${index}` }));

      if (toolCalls.length === 0) {
        context.messages.push({ role: 'assistant', content: text });
        yield done('completion');
        return;
      }

      context.messages.push({
        role: 'assistant',
        content: text || null,
        tool_calls: toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments || '{}' },
        })),
      });

      let finished = false;
      for (const call of toolCalls) {
        let args: Record<string, unknown> = {};
        let argumentError: string | undefined;
        try {
          const parsed: unknown = call.arguments ? JSON.parse(call.arguments) : {};
          if (isRecord(parsed)) args = parsed;
          else argumentError = 'tool arguments must be a JSON object';
        } catch (error) {
          argumentError = `invalid tool arguments: ${errorMessage(error)}`;
        }

        yield { type: 'tool_call', id: call.id, name: call.name, arguments: args };

        let resultText: string;
        let isError: boolean;
        if (argumentError) {
          yield { type: 'error', error: `${call.name}: ${argumentError}` };
          resultText = `Error: ${argumentError}`;
          isError = true;
        } else {
          try {
            const result = await this.tools.call(call.name, args, {
              sessionId: turn.sessionId,
              workingDirectory: context.workingDirectory,
              mode: turn.mode,
              signal,
            });
            resultText = result.content.map((item) => (item.type === 'text' ? item.text : '')).join('');
            isError = result.is_error;
          } catch (error) {
            const wire = toErrorObject(error);
            resultText = `Error: ${wire.message}`;
            isError = true;
          }
        }

        yield {
          type: 'tool_result',
          id: call.id,
          name: call.name,
          content: [{ type: 'text', text: resultText }],
          isError,
        };
        context.messages.push({ role: 'tool', tool_call_id: call.id, content: resultText });
        if (call.name === TASK_DONE_TOOL && !isError) finished = true;
      }

      if (finished) {
        yield done('completion');
        return;
      }
    }
  }
}
