import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { z } from 'zod'
import { AcpClient } from '../src/client/AcpClient.js'
import { RequestError } from '../src/errors.js'
import { FakeSocket, quietLogger, waitFor } from './helpers.js'

describe('AcpClient', () => {
  let socket: FakeSocket
  let client: AcpClient

  beforeEach(() => {
    socket = new FakeSocket()
    client = AcpClient.fromSocket(socket, { logger: quietLogger() })
  })

  afterEach(() => {
    client.close()
  })

  const lastRequest = () => JSON.parse(socket.sent.at(-1) ?? 'null')

  it('should send initialize with the protocol version and validate the result', async () => {
    const pending = client.initialize({ client_info: { name: 'test-editor', version: '1.0.0' } })
    await waitFor(() => socket.sent.length === 1)

    expect(lastRequest()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { protocol_version: '0.4.0', client_info: { name: 'test-editor', version: '1.0.0' } },
    })

    const result = {
      protocol_version: '0.4.0',
      capabilities: {
        prompt: { image: false, embedded_context: true },
        fs: { read_text_file: true, write_text_file: true, list_directory: false, create_directory: false, delete_file: false },
        terminal: { create: true, resize: true, send_input: true, read_output: true },
      },
      server_info: { name: 'acp-gateway', version: '0.1.0' },
    }
    socket.deliver(JSON.stringify({ jsonrpc: '2.0', id: 1, result }))
    expect(await pending).toEqual(result)
  })

  it('should reject a result of the wrong shape', async () => {
    const pending = client.setMode('s1', 'plan')
    await waitFor(() => socket.sent.length === 1)
    socket.deliver('{"jsonrpc":"2.0","id":1,"result":{"success":true}}')
    await expect(pending).rejects.toBeInstanceOf(z.ZodError)
  })

  it('should surface error responses as RequestError', async () => {
    const pending = client.prompt('s1', 'hello', { mode: 'plan' })
    await waitFor(() => socket.sent.length === 1)
    expect(lastRequest().params).toEqual({ session_id: 's1', message: 'hello', mode: 'plan' })

    socket.deliver('{"jsonrpc":"2.0","id":1,"error":{"code":-32003,"message":"Session not found: s1","data":{"session_id":"s1"}}}')
    const error = await pending.catch((e: unknown) => e)
    expect(error).toBeInstanceOf(RequestError)
    expect(error).toMatchObject({ code: -32003, data: { session_id: 's1' } })
  })

  it('should leave session_id out of tool calls without a session', async () => {
    const pending = client.callTool('task_done')
    await waitFor(() => socket.sent.length === 1)
    expect(lastRequest().params).toEqual({ name: 'task_done', arguments: {} })
    socket.deliver('{"jsonrpc":"2.0","id":1,"result":{"content":[{"type":"text","text":"Task done."}],"is_error":false}}')
    expect(await pending).toEqual({ content: [{ type: 'text', text: 'Task done.' }], is_error: false })
  })

  it('should send cancel as a notification', async () => {
    await client.cancelNotification('s1')
    expect(socket.sent).toEqual(['{"jsonrpc":"2.0","method":"session/cancel","params":{"session_id":"s1"}}\n'])
  })

  it('should deliver valid session updates to listeners until they unsubscribe', () => {
    const listener = vi.fn()
    const unsubscribe = client.onUpdate(listener)

    socket.deliver('{"jsonrpc":"2.0","method":"session/update","params":{"session_id":"s1","type":"error","error":"x"}}')
    socket.deliver('{"jsonrpc":"2.0","method":"session/update","params":{"session_id":"s1","type":"bogus"}}')
    socket.deliver('{"jsonrpc":"2.0","method":"something/else","params":{"session_id":"s1","type":"error"}}')
    unsubscribe()
    socket.deliver('{"jsonrpc":"2.0","method":"session/update","params":{"session_id":"s1","type":"cancelled"}}')

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith({ session_id: 's1', type: 'error', error: 'x' })
  })

  it('should reject pending requests when closed', async () => {
    const pending = client.listTools()
    client.close()
    await expect(pending).rejects.toThrow('Connection closed before response to tools/list (id 1)')
    expect(socket.closedWith).toEqual({ code: 1000, reason: 'closing' })
  })
})

describe('AcpClient.spawn', () => {
  it('should talk to a subprocess over its stdio', async () => {
    // cat echoes our request back; the client answers it with -32601, which cat echoes again
    const client = AcpClient.spawn('cat', [], { logger: quietLogger() })
    expect(client.pid).toBeGreaterThan(0)
    try {
      await expect(client.listTools()).rejects.toMatchObject({ code: -32601, message: 'Method not found: tools/list' })
    } finally {
      client.close()
    }
  })
})
