import { createLogger, type Logger } from '../logger.js';
import type { Peer } from '../protocol/json-rpc.js';
import {
  SESSION_UPDATE_METHOD,
  type AcpMessage,
  type MessageContent,
  type PromptResult,
  type SessionUpdateType,
} from '../protocol/types.js';

// ========== SESSION UPDATE STREAM ==========

export interface ToolCallUpdate {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultUpdate {
  toolCallId: string;
  name: string;
  content: MessageContent[];
  isError: boolean;
}

/**
 * Out-of-band `session/update` notifications for one session's turn.
 * Once `complete` or `cancelled` has gone out the stream is closed and
 * further emits are ignored.
 */
export class StreamingNotifier {
  private closed = false;
  private sent = 0;
  private readonly logger: Logger;

  constructor(
    private readonly peer: Peer,
    readonly sessionId: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('streaming');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of updates written so far. */
  get count(): number {
    return this.sent;
  }

  async send(type: SessionUpdateType, payload: Record<string, unknown> = {}): Promise<void> {
    if (this.closed) {
      this.logger.debug('stream.closed.drop', { sessionId: this.sessionId, type });
      return;
    }
    if (type === 'complete' || type === 'cancelled') {
      this.closed = true;
    }
    this.sent++;
    await this.peer.sendNotification(SESSION_UPDATE_METHOD, { session_id: this.sessionId, type, ...payload });
  }

  message(message: AcpMessage): Promise<void> {
    return this.send('message', { message });
  }

  toolCall(call: ToolCallUpdate): Promise<void> {
    return this.send('tool_call', { tool_call: { id: call.id, name: call.name, arguments: call.arguments } });
  }

  toolResult(result: ToolResultUpdate): Promise<void> {
    return this.send('tool_result', {
      tool_result: {
        tool_call_id: result.toolCallId,
        name: result.name,
        content: result.content,
        is_error: result.isError,
      },
    });
  }

  error(error: string): Promise<void> {
    return this.send('error', { error });
  }

  complete(result: PromptResult): Promise<void> {
    return this.send('complete', { ...result });
  }

  cancel(): Promise<void> {
    return this.send('cancelled');
  }
}
