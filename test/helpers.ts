import { PassThrough } from 'node:stream'
import type { ChatDelta, ChatRequest, ChatStreamClient } from '../src/agent/chat-client.js'
import { Logger } from '../src/logger.js'
import { FrameChannel, StreamChannel, type MessageSocket } from '../src/protocol/io.js'

export const quietLogger = () => new Logger({ level: 'error', sink: () => {} })

/** Records every log line; `lines` holds the parsed entries. */
export function captureLogger(level: 'error' | 'warn' | 'info' | 'debug' = 'debug') {
  const lines: Array<{ level: string; component: string; msg: string; data?: Record<string, unknown> }> = []
  const logger = new Logger({ level, sink: (line) => lines.push(JSON.parse(line)) })
  return { logger, lines }
}

/** In-memory frame channel: `push` plays the remote side, `sent` records what we wrote. */
export class MemoryChannel extends FrameChannel {
  readonly sent: string[] = []

  constructor() {
    super('memory', quietLogger())
  }

  push(text: string) {
    this.ingest(text)
  }

  /** The remote side stops sending but still reads. */
  endInput() {
    this.markEnded()
  }

  async send(frame: string): Promise<void> {
    this.sent.push(frame)
  }

  close() {
    this.markClosed()
  }

  sentMessages(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame))
  }
}

/** A connected pair of stdio-style channels over PassThrough streams. */
export function streamPair() {
  const toServer = new PassThrough()
  const toClient = new PassThrough()
  return {
    toServer,
    toClient,
    server: new StreamChannel(toServer, toClient, quietLogger()),
  }
}

export class FakeSocket implements MessageSocket {
  readonly sent: string[] = []
  closedWith: { code?: number; reason?: string } | undefined
  private readonly messageListeners: Array<(data: string) => void> = []
  private readonly closeListeners: Array<() => void> = []
  private readonly errorListeners: Array<(error: Error) => void> = []

  async send(data: string): Promise<void> {
    this.sent.push(data)
  }

  close(code?: number, reason?: string) {
    this.closedWith = { code, reason }
  }

  onMessage(listener: (data: string) => void) {
    this.messageListeners.push(listener)
  }

  onClose(listener: () => void) {
    this.closeListeners.push(listener)
  }

  onError(listener: (error: Error) => void) {
    this.errorListeners.push(listener)
  }

  deliver(data: string) {
    for (const listener of this.messageListeners) listener(data)
  }

  remoteClose() {
    for (const listener of this.closeListeners) listener()
  }

  fail(error: Error) {
    for (const listener of this.errorListeners) listener(error)
  }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now()
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) throw new Error('waitFor: condition not met in time')
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}

/** Plays back one list of deltas per chat step; an Error step makes that call fail. */
export class ScriptedChatClient implements ChatStreamClient {
  readonly requests: ChatRequest[] = []

  constructor(private readonly steps: Array<ChatDelta[] | Error>) {}

  async *stream(request: ChatRequest): AsyncIterable<ChatDelta> {
    this.requests.push({ ...request, messages: [...request.messages] })
    const step = this.steps.shift() ?? []
    if (step instanceof Error) throw step
    for (const delta of step) yield delta
  }
}
