import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough } from 'node:stream'
import type { AgentContextInit, AgentEvent, AgentRuntime, AgentTurn } from '../src/agent/runtime.js'
import { AcpClient, type SessionUpdate } from '../src/client/AcpClient.js'
import { DEFAULT_MODELS, loadConfig, type GatewayConfig } from '../src/config.js'
import { createGateway, type AcpServer, type GatewayOverrides } from '../src/server/AcpServer.js'
import { SERVER_CAPABILITIES } from '../src/server/methods.js'
import { MemoryChannel, ScriptedChatClient, quietLogger, streamPair, waitFor } from './helpers.js'

/** Emits one message, then holds the turn open until it is aborted. */
class BlockingRuntime implements AgentRuntime {
  readonly contexts = new Set<string>()

  createContext(init: AgentContextInit) {
    this.contexts.add(init.sessionId)
  }

  dropContext(sessionId: string) {
    this.contexts.delete(sessionId)
  }

  hasContext(sessionId: string) {
    return this.contexts.has(sessionId)
  }

  async *run(_turn: AgentTurn, signal: AbortSignal): AsyncIterable<AgentEvent> {
    yield { type: 'message', content: 'working' }
    await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }))
    yield { type: 'done', content: 'partial', stopReason: 'user_stop' }
  }
}

describe('ACP gateway', () => {
  let dir: string
  let gateway: AcpServer
  let clients: AcpClient[]

  const start = (overrides: Partial<GatewayConfig> = {}, extra: GatewayOverrides = {}) => {
    const config = { ...loadConfig([], {}, dir), ...overrides }
    gateway = createGateway(config, { logger: quietLogger(), chatClient: new ScriptedChatClient([]), ...extra })
    gateway.start()
    return gateway
  }

  const connect = () => {
    const pair = streamPair()
    gateway.attach(pair.server)
    const client = AcpClient.fromStreams(pair.toClient, pair.toServer, { logger: quietLogger() })
    const updates: SessionUpdate[] = []
    client.onUpdate((update) => updates.push(update))
    clients.push(client)
    return { client, updates }
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'acp-gateway-'))
    clients = []
  })

  afterEach(async () => {
    for (const client of clients) client.close()
    gateway.stop()
    await rm(dir, { recursive: true, force: true })
  })

  describe('initialize', () => {
    it('should report the protocol version, capabilities and server info', async () => {
      start()
      const { client } = connect()

      expect(await client.initialize({ client_info: { name: 'test-editor', version: '1.0.0' } })).toEqual({
        protocol_version: '0.4.0',
        capabilities: SERVER_CAPABILITIES,
        server_info: { name: 'acp-gateway', version: '0.1.0' },
      })
      expect(gateway.methods.initialized).toBe(true)
    })

    it('should intersect capabilities with the ones the client declares', async () => {
      start()
      const { client } = connect()

      const result = await client.initialize({ capabilities: { fs: { read_text_file: true } } })
      expect(result.capabilities).toEqual({
        prompt: { image: false, embedded_context: true },
        fs: {
          read_text_file: true,
          write_text_file: false,
          list_directory: false,
          create_directory: false,
          delete_file: false,
        },
        terminal: { create: true, resize: true, send_input: true, read_output: true },
      })
    })

    it('should answer a repeated initialize with the same result', async () => {
      start()
      const { client } = connect()
      const params = { capabilities: { fs: { read_text_file: true, write_text_file: true } } }

      const first = await client.initialize(params)
      await client.newSession({ working_directory: dir })
      const second = await client.initialize(params)

      expect(second).toEqual(first)
      expect(second.capabilities.fs).toEqual({
        read_text_file: true,
        write_text_file: true,
        list_directory: false,
        create_directory: false,
        delete_file: false,
      })
    })

    it('should tolerate a different protocol version unless strict', async () => {
      start()
      const { client } = connect()
      await expect(client.initialize({ protocol_version: '0.1.0' })).resolves.toMatchObject({ protocol_version: '0.4.0' })
    })

    it('should refuse a different protocol version when strict', async () => {
      start({ strictProtocolVersion: true })
      const { client } = connect()
      await expect(client.initialize({ protocol_version: '0.1.0' })).rejects.toMatchObject({
        code: -32005,
        message: 'Unsupported operation: protocol version 0.1.0 (server speaks 0.4.0)',
      })
    })
  })

  describe('sessions', () => {
    it('should create a session in an existing directory', async () => {
      start()
      const { client } = connect()

      const session = await client.newSession({ working_directory: dir, mode: 'safe' })
      expect(session).toEqual({
        session_id: session.session_id,
        working_directory: dir,
        mode: 'safe',
        model: 'qwen3:latest',
        capabilities: SERVER_CAPABILITIES,
        available_models: DEFAULT_MODELS,
        available_modes: ['execute', 'plan', 'safe'],
      })
      expect(gateway.health().sessions.active_sessions).toBe(1)
    })

    it('should reject a working directory that does not exist', async () => {
      start()
      const { client } = connect()
      const missing = join(dir, 'missing')

      await expect(client.newSession({ working_directory: missing })).rejects.toMatchObject({
        code: -32602,
        message: `Invalid params: working_directory is not an existing directory: ${missing}`,
      })
    })

    it('should refuse sessions beyond the configured limit', async () => {
      start({ maxSessions: 1 })
      const { client } = connect()
      await client.newSession()

      await expect(client.newSession()).rejects.toMatchObject({
        code: -32603,
        data: { reason: 'capacity', max_sessions: 1 },
      })
    })

    it('should switch mode and model', async () => {
      start()
      const { client } = connect()
      const { session_id } = await client.newSession()

      expect(await client.setMode(session_id, 'plan')).toEqual({ success: true, mode: 'plan' })
      expect(await client.setModel(session_id, 'gpt-4')).toEqual({ success: true, model: 'gpt-4' })
      expect(gateway.sessions.get(session_id)).toMatchObject({ mode: 'plan', model: 'gpt-4' })
    })

    it('should answer unknown sessions with -32003', async () => {
      start()
      const { client } = connect()
      await expect(client.setMode('nope', 'plan')).rejects.toMatchObject({
        code: -32003,
        message: 'Session not found: nope',
      })
    })

    it('should answer swept sessions with -32004', async () => {
      let now = 0
      start({ sessionTimeout: 10 }, { clock: () => now })
      const { client } = connect()
      const { session_id } = await client.newSession()

      now = 10_001
      expect(gateway.sessions.sweepExpired()).toBe(1)
      await expect(client.setModel(session_id, 'gpt-4')).rejects.toMatchObject({
        code: -32004,
        message: `Session expired: ${session_id}`,
      })
    })

    it('should delete a session on cancel', async () => {
      start()
      const { client } = connect()
      const { session_id } = await client.newSession()

      expect(await client.cancel(session_id)).toEqual({ success: true })
      await expect(client.setMode(session_id, 'plan')).rejects.toMatchObject({ code: -32003 })
      expect(gateway.health().sessions.active_sessions).toBe(0)
    })
  })

  describe('tools', () => {
    it('should list the built-in tools', async () => {
      start()
      const { client } = connect()
      const { tools } = await client.listTools()
      expect(tools.map((tool) => tool.name)).toEqual(['bash_tool', 'edit_tool', 'sequential_thinking', 'task_done'])
    })

    it('should run bash_tool inside a session', async () => {
      start()
      const { client } = connect()
      const { session_id } = await client.newSession({ working_directory: tmpdir() })

      const result = await client.callTool('bash_tool', { command: 'echo hi' }, session_id)

      expect(result).toEqual({ content: [{ type: 'text', text: 'hi\n' }], is_error: false })
      expect(gateway.health().sessions.total_tool_calls).toBe(1)
    })

    it('should check the tool name before the session', async () => {
      start()
      const { client } = connect()
      await expect(client.callTool('nope', {}, 'missing-session')).rejects.toMatchObject({
        code: -32001,
        message: 'Tool not found: nope',
      })
      await expect(client.callTool('bash_tool', { command: 'true' }, 'missing-session')).rejects.toMatchObject({
        code: -32003,
      })
    })

    it('should apply the session mode to tool calls', async () => {
      start()
      const { client } = connect()
      const { session_id } = await client.newSession({ mode: 'plan' })

      await expect(client.callTool('bash_tool', { command: 'echo hi' }, session_id)).rejects.toMatchObject({
        code: -32002,
        message: 'Permission denied: exec operations are disabled in plan mode',
      })
    })

    it('should reject arguments that fail validation', async () => {
      start()
      const { client } = connect()
      await expect(client.callTool('bash_tool', {})).rejects.toMatchObject({
        code: -32602,
        message: 'Invalid params: command: Required',
      })
    })
  })

  describe('prompt', () => {
    it('should stream updates and answer with the final message', async () => {
      start({}, { chatClient: new ScriptedChatClient([[{ content: 'Hel' }, { content: 'lo' }]]) })
      const { client, updates } = connect()
      const { session_id } = await client.newSession()

      const result = await client.prompt(session_id, 'say hello')

      expect(result).toEqual({
        message: { role: 'assistant', content: [{ type: 'text', text: 'Hello' }] },
        stop_reason: 'completion',
        usage: { total_messages: 3, remaining_steps: 49 },
      })
      expect(updates.map((update) => update.type)).toEqual(['message', 'message', 'complete'])
      expect(updates[0]).toEqual({
        session_id,
        type: 'message',
        message: { role: 'assistant', content: [{ type: 'text', text: 'Hel' }] },
      })
      expect(gateway.health().sessions.total_messages).toBe(1)
    })

    it('should report tool calls and results while the agent works', async () => {
      start(
        {},
        {
          chatClient: new ScriptedChatClient([
            [{ toolCalls: [{ index: 0, id: 'c1', name: 'bash_tool', arguments: '{"command":"echo hi"}' }] }],
            [{ content: 'done' }],
          ]),
        },
      )
      const { client, updates } = connect()
      const { session_id } = await client.newSession()
      const update = vi.spyOn(gateway.sessions, 'update')

      const result = await client.prompt(session_id, 'run it')

      expect(result.stop_reason).toBe('completion')
      expect(update).toHaveBeenCalledWith(session_id, { toolCallCount: 1 })
      expect(updates.map((update) => update.type)).toEqual(['tool_call', 'tool_result', 'message', 'complete'])
      expect(updates[0]).toEqual({
        session_id,
        type: 'tool_call',
        tool_call: { id: 'c1', name: 'bash_tool', arguments: { command: 'echo hi' } },
      })
      expect(updates[1]).toEqual({
        session_id,
        type: 'tool_result',
        tool_result: { tool_call_id: 'c1', name: 'bash_tool', content: [{ type: 'text', text: 'hi\n' }], is_error: false },
      })
      expect(gateway.health().sessions.total_tool_calls).toBe(1)
    })

    it('should turn a failing agent into -32000 after an error update', async () => {
      start({}, { chatClient: new ScriptedChatClient([new Error('upstream down')]) })
      const { client, updates } = connect()
      const { session_id } = await client.newSession()

      await expect(client.prompt(session_id, 'hi')).rejects.toMatchObject({
        code: -32000,
        message: 'Agent error: upstream down',
      })
      expect(updates).toEqual([{ session_id, type: 'error', error: 'Agent error: upstream down' }])
    })

    it('should answer unknown sessions with -32003', async () => {
      start()
      const { client } = connect()
      await expect(client.prompt('ghost', 'hi')).rejects.toMatchObject({ code: -32003 })
    })

    it('should stop a running turn on a cancel notification', async () => {
      const runtime = new BlockingRuntime()
      start({}, { runtime })
      const { client, updates } = connect()
      const { session_id } = await client.newSession()

      const pending = client.prompt(session_id, 'long task')
      await waitFor(() => updates.length === 1)
      await client.cancelNotification(session_id)

      expect(await pending).toEqual({
        message: { role: 'assistant', content: [{ type: 'text', text: 'partial' }] },
        stop_reason: 'user_stop',
      })
      expect(updates.map((update) => update.type)).toEqual(['message', 'cancelled'])
      expect(runtime.hasContext(session_id)).toBe(false)
      expect(gateway.methods.runningTurns).toBe(0)
    })

    it('should refuse a second prompt on a busy session', async () => {
      start({}, { runtime: new BlockingRuntime() })
      const first = connect()
      const second = connect()
      const { session_id } = await first.client.newSession()

      const pending = first.client.prompt(session_id, 'long task')
      await waitFor(() => first.updates.length === 1)

      await expect(second.client.prompt(session_id, 'me too')).rejects.toMatchObject({
        code: -32005,
        message: `Unsupported operation: a prompt is already running for session ${session_id}`,
      })
      expect(await second.client.cancel(session_id)).toEqual({ success: true })
      await expect(pending).resolves.toMatchObject({ stop_reason: 'user_stop' })
    })
  })

  describe('wire level', () => {
    const exchange = async (lines: string) => {
      const channel = new MemoryChannel()
      const connection = gateway.attach(channel)
      channel.push(lines)
      await connection.idle()
      return channel.sentMessages()
    }

    it('should answer garbage, unknown methods and bad envelopes in order', async () => {
      start()
      const replies = await exchange(
        'garbage\n' +
          '{"jsonrpc":"2.0","id":1,"method":"session/fly"}\n' +
          '{"jsonrpc":"1.0","id":2,"method":"initialize"}\n' +
          '{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"nope"}}\n',
      )

      expect(replies).toEqual([
        expect.objectContaining({ id: null, error: expect.objectContaining({ code: -32700 }) }),
        {
          jsonrpc: '2.0',
          id: 1,
          error: { code: -32601, message: 'Method not found: session/fly', data: { method: 'session/fly' } },
        },
        { jsonrpc: '2.0', id: 2, error: { code: -32600, message: 'Invalid request: jsonrpc must be "2.0"' } },
        { jsonrpc: '2.0', id: 3, error: { code: -32001, message: 'Tool not found: nope', data: { tool: 'nope' } } },
      ])
    })

    it('should use snake_case on the wire', async () => {
      start()
      const [reply] = await exchange('{"jsonrpc":"2.0","id":"s","method":"session/new","params":{}}\n')
      expect(reply).toMatchObject({
        id: 's',
        result: { working_directory: dir, mode: 'execute', available_modes: ['execute', 'plan', 'safe'] },
      })
    })

    it('should answer every request that arrived before stdin ended', async () => {
      start()
      const input = new PassThrough()
      const output = new PassThrough()
      let written = ''
      output.setEncoding('utf8')
      output.on('data', (chunk: string) => (written += chunk))
      const served = gateway.serveStdio(input, output)

      input.write('{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}\n')
      input.write(JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'session/new', params: { working_directory: dir } }) + '\n')
      input.end('{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"bash_tool","arguments":{"command":"echo hi"}}}\n')

      const connection = await served
      expect(connection.isClosed).toBe(true)
      await waitFor(() => written.split('\n').filter((line) => line.length > 0).length === 3)

      const responses = written.trim().split('\n').map((line) => JSON.parse(line))
      expect(responses.map((response) => response.id)).toEqual([1, 2, 3])
      expect(responses[1].result.working_directory).toBe(dir)
      expect(responses[2]).toEqual({
        jsonrpc: '2.0',
        id: 3,
        result: { content: [{ type: 'text', text: 'hi\n' }], is_error: false },
      })
      expect(gateway.connectionCount).toBe(0)
    })
  })

  describe('health', () => {
    it('should summarise sessions and connections', async () => {
      start()
      const { client } = connect()
      await client.initialize()
      await client.newSession()

      expect(gateway.health()).toEqual({
        status: 'ok',
        service: 'acp-gateway',
        initialized: true,
        sessions: {
          active_sessions: 1,
          max_sessions: 100,
          total_messages: 0,
          total_tool_calls: 0,
          session_timeout: 3600,
        },
        connections: 1,
      })
    })

    it('should forget connections whose input ends', async () => {
      start()
      const pair = streamPair()
      gateway.attach(pair.server)
      expect(gateway.connectionCount).toBe(1)

      pair.toServer.end()
      pair.toServer.resume()
      await waitFor(() => gateway.connectionCount === 0)
    })
  })
})
