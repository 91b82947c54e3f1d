import { z } from 'zod';
import type { ErrorObject } from '../errors.js';

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '0.4.0';

// ========== JSON-RPC ENVELOPES ==========

export type RequestId = string | number;
export type Params = Record<string, unknown>;

export type JsonRpcRequest = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  method: string;
  params?: Params;
};

export type JsonRpcNotification = {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Params;
};

export type JsonRpcSuccess = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId | null;
  result: unknown;
};

export type JsonRpcFailure = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId | null;
  error: ErrorObject;
};

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

// ========== ACP WIRE TYPES ==========

export const SESSION_MODES = ['execute', 'plan', 'safe'] as const;
export type SessionMode = (typeof SESSION_MODES)[number];

export const STOP_REASONS = ['user_stop', 'tool_call_limit', 'completion', 'error'] as const;
export type StopReason = (typeof STOP_REASONS)[number];

export type MessageContent =
  | { type: 'text'; text: string }
  | { type: 'image'; image_url: string }
  | { type: 'embedded_resource'; resource: Record<string, unknown> };

export type AcpMessage = {
  role: 'user' | 'assistant' | 'system';
  content: MessageContent[];
};

export type PromptCapabilities = {
  image: boolean;
  embedded_context: boolean;
};

export type FileSystemCapabilities = {
  read_text_file: boolean;
  write_text_file: boolean;
  list_directory: boolean;
  create_directory: boolean;
  delete_file: boolean;
};

export type TerminalCapabilities = {
  create: boolean;
  resize: boolean;
  send_input: boolean;
  read_output: boolean;
};

export type AgentCapabilities = {
  prompt: PromptCapabilities;
  fs: FileSystemCapabilities;
  terminal: TerminalCapabilities;
};

export type ServerInfo = {
  name: string;
  version: string;
};

export type InitializeResult = {
  protocol_version: string;
  capabilities: AgentCapabilities;
  server_info: ServerInfo;
};

export type SessionResult = {
  session_id: string;
  working_directory: string;
  mode: SessionMode;
  model: string;
  capabilities: AgentCapabilities;
  available_models: string[];
  available_modes: SessionMode[];
};

export type ToolParameter = {
  name: string;
  description: string;
  type: string;
  required: boolean;
  default?: unknown;
  enum?: unknown[];
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, ToolParameter>;
  required: string[];
};

export type ToolDescriptor = {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
};

export type ToolResult = {
  content: MessageContent[];
  is_error: boolean;
};

export type PromptUsage = Record<string, unknown>;

export type PromptResult = {
  message: AcpMessage;
  stop_reason: StopReason;
  usage?: PromptUsage;
};

export type SessionUpdateType = 'message' | 'tool_call' | 'tool_result' | 'error' | 'complete' | 'cancelled';

// ========== ACP METHODS ==========

export const ACP_METHODS = [
  'initialize',
  'session/new',
  'session/prompt',
  'session/set_mode',
  'session/set_model',
  'session/cancel',
  'tools/list',
  'tools/call',
] as const;
export type AcpMethod = (typeof ACP_METHODS)[number];

export const SESSION_UPDATE_METHOD = 'session/update';

// ========== PARAM SCHEMAS ==========

const capabilityFlags = <T extends z.ZodRawShape>(shape: T) => z.object(shape).partial().passthrough();

export const agentCapabilitiesSchema = z
  .object({
    prompt: capabilityFlags({ image: z.boolean(), embedded_context: z.boolean() }),
    fs: capabilityFlags({
      read_text_file: z.boolean(),
      write_text_file: z.boolean(),
      list_directory: z.boolean(),
      create_directory: z.boolean(),
      delete_file: z.boolean(),
    }),
    terminal: capabilityFlags({
      create: z.boolean(),
      resize: z.boolean(),
      send_input: z.boolean(),
      read_output: z.boolean(),
    }),
  })
  .partial()
  .passthrough();
export type DeclaredCapabilities = z.infer<typeof agentCapabilitiesSchema>;

export const initializeParamsSchema = z
  .object({
    protocol_version: z.string().optional(),
    capabilities: agentCapabilitiesSchema.optional(),
    client_info: z.object({ name: z.string(), version: z.string() }).optional(),
    working_directory: z.string().optional(),
  })
  .passthrough();
export type InitializeParams = z.infer<typeof initializeParamsSchema>;

const sessionIdSchema = z.string().min(1, 'session_id is required');
const modeSchema = z.enum(SESSION_MODES);

export const newSessionParamsSchema = z.object({
  working_directory: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
  mode: modeSchema.optional(),
  model: z.string().min(1).optional(),
});
export type NewSessionParams = z.infer<typeof newSessionParamsSchema>;

export const promptParamsSchema = z.object({
  session_id: sessionIdSchema,
  message: z.string(),
  mode: modeSchema.optional(),
  model: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
});
export type PromptParams = z.infer<typeof promptParamsSchema>;

export const setModeParamsSchema = z.object({
  session_id: sessionIdSchema,
  mode: modeSchema,
});

export const setModelParamsSchema = z.object({
  session_id: sessionIdSchema,
  model: z.string().min(1),
});

export const cancelParamsSchema = z.object({
  session_id: sessionIdSchema,
});

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  session_id: sessionIdSchema.optional(),
});
export type ToolCallParams = z.infer<typeof toolCallParamsSchema>;

// ========== RESULT SCHEMAS (client side) ==========

const messageContentSchema = z.union([
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('image'), image_url: z.string() }),
  z.object({ type: z.literal('embedded_resource'), resource: z.record(z.unknown()) }),
]);

const fullCapabilitiesSchema = z.object({
  prompt: z.object({ image: z.boolean(), embedded_context: z.boolean() }),
  fs: z.object({
    read_text_file: z.boolean(),
    write_text_file: z.boolean(),
    list_directory: z.boolean(),
    create_directory: z.boolean(),
    delete_file: z.boolean(),
  }),
  terminal: z.object({
    create: z.boolean(),
    resize: z.boolean(),
    send_input: z.boolean(),
    read_output: z.boolean(),
  }),
});

export const initializeResultSchema = z.object({
  protocol_version: z.string(),
  capabilities: fullCapabilitiesSchema,
  server_info: z.object({ name: z.string(), version: z.string() }),
});

export const sessionResultSchema = z.object({
  session_id: z.string(),
  working_directory: z.string(),
  mode: modeSchema,
  model: z.string(),
  capabilities: fullCapabilitiesSchema,
  available_models: z.array(z.string()),
  available_modes: z.array(modeSchema),
});

export const promptResultSchema = z.object({
  message: z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.array(messageContentSchema),
  }),
  stop_reason: z.enum(STOP_REASONS),
  usage: z.record(z.unknown()).optional(),
});

export const toolResultSchema = z.object({
  content: z.array(messageContentSchema),
  is_error: z.boolean(),
});

const toolParameterSchema = z.object({
  name: z.string(),
  description: z.string(),
  type: z.string(),
  required: z.boolean(),
  default: z.unknown().optional(),
  enum: z.array(z.unknown()).optional(),
});

export const toolsListResultSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      input_schema: z.object({
        type: z.literal('object'),
        properties: z.record(toolParameterSchema),
        required: z.array(z.string()),
      }),
    }),
  ),
});

export const setModeResultSchema = z.object({ success: z.literal(true), mode: modeSchema });
export const setModelResultSchema = z.object({ success: z.literal(true), model: z.string() });
export const successResultSchema = z.object({ success: z.literal(true) });

export const sessionUpdateSchema = z
  .object({
    session_id: z.string(),
    type: z.enum(['message', 'tool_call', 'tool_result', 'error', 'complete', 'cancelled']),
  })
  .passthrough();
