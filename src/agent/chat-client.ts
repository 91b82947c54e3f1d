import OpenAI from 'openai';
import type { Logger } from '../logger.js';

export type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
export type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  tools: ChatTool[];
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  arguments?: string;
}

export interface ChatDelta {
  content?: string;
  toolCalls?: ChatToolCallDelta[];
  finishReason?: string | null;
}

/** A streaming chat-completions backend. */
export interface ChatStreamClient {
  stream(request: ChatRequest): AsyncIterable<ChatDelta>;
}

export interface OpenAIChatClientConfig {
  apiKey: string;
  baseURL: string;
  temperature?: number;
  maxTokens?: number;
}

/** OpenAI-compatible endpoint (OpenAI itself, Ollama, vLLM, ...). */
export class OpenAIChatClient implements ChatStreamClient {
  private readonly openai: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number | undefined;

  constructor(
    private readonly log: Logger,
    config: OpenAIChatClientConfig,
  ) {
    this.openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.temperature = config.temperature ?? 0.1;
    this.maxTokens = config.maxTokens;
    this.log.info('chat.client.initialized', { baseURL: config.baseURL, temperature: this.temperature });
  }

  async *stream(request: ChatRequest): AsyncIterable<ChatDelta> {
    const stream = await this.openai.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        tools: request.tools.length > 0 ? request.tools : undefined,
        temperature: request.temperature ?? this.temperature,
        max_tokens: this.maxTokens,
        stream: true,
      },
      { signal: request.signal },
    );

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      if (!choice) continue;
      yield {
        content: choice.delta.content ?? undefined,
        toolCalls: choice.delta.tool_calls?.map((call) => ({
          index: call.index,
          id: call.id,
          name: call.function?.name,
          arguments: call.function?.arguments,
        })),
        finishReason: choice.finish_reason,
      };
    }
    this.log.debug('chat.stream.done', { model: request.model });
  }
}
