import { describe, it, expect, beforeEach } from 'vitest'
import type { Peer } from '../src/protocol/json-rpc.js'
import type { Params } from '../src/protocol/types.js'
import { StreamingNotifier } from '../src/streaming/StreamingNotifier.js'
import { quietLogger } from './helpers.js'

class RecordingPeer implements Peer {
  readonly id = 'recording'
  readonly notifications: Array<{ method: string; params?: Params }> = []

  async sendNotification(method: string, params?: Params): Promise<void> {
    this.notifications.push({ method, params })
  }
}

describe('StreamingNotifier', () => {
  let peer: RecordingPeer
  let notifier: StreamingNotifier

  beforeEach(() => {
    peer = new RecordingPeer()
    notifier = new StreamingNotifier(peer, 'sess-1', quietLogger())
  })

  it('should send session/update notifications tagged with the session', async () => {
    await notifier.message({ role: 'assistant', content: [{ type: 'text', text: 'hello' }] })
    expect(peer.notifications).toEqual([
      {
        method: 'session/update',
        params: {
          session_id: 'sess-1',
          type: 'message',
          message: { role: 'assistant', content: [{ type: 'text', text: 'hello' }] },
        },
      },
    ])
  })

  it('should shape tool calls and results with wire field names', async () => {
    await notifier.toolCall({ id: 'call_1', name: 'bash_tool', arguments: { command: 'ls' } })
    await notifier.toolResult({
      toolCallId: 'call_1',
      name: 'bash_tool',
      content: [{ type: 'text', text: 'a.txt' }],
      isError: false,
    })

    expect(peer.notifications.map((n) => n.params)).toEqual([
      {
        session_id: 'sess-1',
        type: 'tool_call',
        tool_call: { id: 'call_1', name: 'bash_tool', arguments: { command: 'ls' } },
      },
      {
        session_id: 'sess-1',
        type: 'tool_result',
        tool_result: {
          tool_call_id: 'call_1',
          name: 'bash_tool',
          content: [{ type: 'text', text: 'a.txt' }],
          is_error: false,
        },
      },
    ])
  })

  it('should close the stream after complete', async () => {
    await notifier.complete({
      message: { role: 'assistant', content: [{ type: 'text', text: 'done' }] },
      stop_reason: 'completion',
    })
    await notifier.error('too late')
    await notifier.cancel()

    expect(notifier.isClosed).toBe(true)
    expect(notifier.count).toBe(1)
    expect(peer.notifications[0]?.params).toEqual({
      session_id: 'sess-1',
      type: 'complete',
      message: { role: 'assistant', content: [{ type: 'text', text: 'done' }] },
      stop_reason: 'completion',
    })
  })

  it('should close the stream after cancelled', async () => {
    await notifier.error('boom')
    await notifier.cancel()
    await notifier.message({ role: 'assistant', content: [] })

    expect(peer.notifications.map((n) => n.params?.type)).toEqual(['error', 'cancelled'])
    expect(peer.notifications[0]?.params).toEqual({ session_id: 'sess-1', type: 'error', error: 'boom' })
  })
})
