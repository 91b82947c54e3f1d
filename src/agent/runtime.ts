import type { MessageContent, PromptUsage, SessionMode, StopReason } from '../protocol/types.js';

export interface AgentContextInit {
  sessionId: string;
  workingDirectory: string;
  metadata: Record<string, unknown>;
}

export interface AgentTurn {
  sessionId: string;
  message: string;
  mode: SessionMode;
  model: string;
  workingDirectory: string;
}

/** Events a runtime yields while driving one turn; a turn ends with `done`. */
export type AgentEvent =
  | { type: 'message'; content: string }
  | { type: 'tool_call'; id: string; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_result'; id: string; name: string; content: MessageContent[]; isError: boolean }
  | { type: 'error'; error: string }
  | { type: 'done'; content: string; stopReason: StopReason; usage?: PromptUsage };

/**
 * The agent behind the gateway. `run` must stop promptly once `signal`
 * aborts; failures are thrown and become agent errors on the wire.
 */
export interface AgentRuntime {
  createContext(init: AgentContextInit): void | Promise<void>;
  run(turn: AgentTurn, signal: AbortSignal): AsyncIterable<AgentEvent>;
  dropContext(sessionId: string): void;
  hasContext(sessionId: string): boolean;
}
