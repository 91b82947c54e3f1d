import { isAbsolute, resolve } from 'node:path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { RequestError } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import { PermissionEngine } from '../permissions/engine.js';
import type { SessionMode, ToolDescriptor, ToolParameter, ToolResult } from '../protocol/types.js';
import type { AgentTool, ToolOutput } from './types.js';

export interface ToolRegistryOptions {
  permissions?: PermissionEngine;
  /** Flag text outputs that look like failures (`Error:` / `Exception:` prefix, or `failed`). */
  errorHeuristic?: boolean;
  /** Used when a call carries no session. */
  defaultWorkingDirectory?: string;
  logger?: Logger;
}

export interface ToolCallOptions {
  sessionId?: string;
  workingDirectory?: string;
  mode?: SessionMode;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function looksLikeFailure(text: string): boolean {
  return text.startsWith('Error:') || text.startsWith('Exception:') || text.toLowerCase().includes('failed');
}

/** Normalizes a tool's output to text plus an error flag. An explicit flag always wins. */
export function classifyToolOutput(output: ToolOutput, heuristic: boolean): { text: string; isError: boolean } {
  if (typeof output === 'string') {
    return { text: output, isError: heuristic && looksLikeFailure(output) };
  }
  return { text: output.text, isError: output.isError ?? (heuristic && looksLikeFailure(output.text)) };
}

function jsonSchemaType(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first = value.find((t): t is string => typeof t === 'string' && t !== 'null');
    if (first) return first;
  }
  return 'string';
}

/** Flattens a tool's zod schema into the descriptor's `input_schema`. */
export function describeTool(tool: AgentTool): ToolDescriptor {
  const json: unknown = zodToJsonSchema(tool.schema, { target: 'jsonSchema7', $refStrategy: 'none' });
  const properties: Record<string, ToolParameter> = {};
  const required: string[] = [];

  if (isRecord(json)) {
    if (Array.isArray(json.required)) {
      for (const name of json.required) {
        if (typeof name === 'string') required.push(name);
      }
    }
    if (isRecord(json.properties)) {
      for (const [name, def] of Object.entries(json.properties)) {
        const prop = isRecord(def) ? def : {};
        const param: ToolParameter = {
          name,
          description: typeof prop.description === 'string' ? prop.description : '',
          type: jsonSchemaType(prop.type),
          required: required.includes(name),
        };
        if ('default' in prop) param.default = prop.default;
        if (Array.isArray(prop.enum)) param.enum = prop.enum;
        properties[name] = param;
      }
    }
  }

  return {
    name: tool.name,
    description: tool.description,
    input_schema: { type: 'object', properties, required },
  };
}

/**
 * Owns the tool set: descriptor cache, argument preparation, permission
 * checks and result classification.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, AgentTool>();
  private descriptors: ToolDescriptor[] | undefined;
  private readonly logger: Logger;
  private readonly permissions: PermissionEngine;
  private readonly errorHeuristic: boolean;
  private readonly defaultWorkingDirectory: string | undefined;
  private calls = 0;
  private failures = 0;

  constructor(tools: Iterable<AgentTool> = [], options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger('tools');
    this.permissions = options.permissions ?? new PermissionEngine(this.logger.child('permissions'));
    this.errorHeuristic = options.errorHeuristic ?? true;
    this.defaultWorkingDirectory = options.defaultWorkingDirectory;
    for (const tool of tools) this.register(tool);
  }

  /** Adds or replaces a tool. Drops the descriptor cache. */
  register(tool: AgentTool): this {
    this.tools.set(tool.name, tool);
    this.invalidate();
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  get names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDescriptor[] {
    if (!this.descriptors) {
      this.descriptors = [...this.tools.values()].map(describeTool);
      this.logger.debug('tools.cache.built', { count: this.descriptors.length });
    }
    return this.descriptors;
  }

  invalidate() {
    this.descriptors = undefined;
  }

  isCached(): boolean {
    return this.descriptors !== undefined;
  }

  /**
   * Runs a tool and returns its wire result.
   * @throws RequestError for an unknown tool or a denied permission; ZodError for bad arguments
   */
  async call(name: string, args: Record<string, unknown>, options: ToolCallOptions = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw RequestError.toolNotFound(name);
    }

    if (options.mode) {
      const kind = tool.kindOf?.(args) ?? tool.kind;
      const decision = this.permissions.decide({ kind, mode: options.mode, resource: name });
      if (!decision.allow) {
        throw RequestError.permissionDenied(decision.reason ?? name, { tool: name, kind, mode: options.mode });
      }
    }

    const workingDirectory = options.workingDirectory ?? this.defaultWorkingDirectory;
    const parsed = tool.schema.safeParse(this.prepareArguments(tool, args, workingDirectory));
    if (!parsed.success) {
      throw parsed.error;
    }

    this.calls++;
    const started = Date.now();
    let output: ToolOutput;
    try {
      output = await tool.invoke(parsed.data, {
        sessionId: options.sessionId,
        workingDirectory,
        signal: options.signal,
        logger: this.logger,
      });
    } catch (error) {
      this.failures++;
      this.logger.error('tool.invoke.error', { tool: name, sessionId: options.sessionId, error: errorMessage(error) });
      return {
        content: [{ type: 'text', text: `Error executing tool ${name}: ${errorMessage(error)}` }],
        is_error: true,
      };
    }

    const { text, isError } = classifyToolOutput(output, this.errorHeuristic);
    if (isError) this.failures++;
    this.logger.debug('tool.invoke.done', { tool: name, sessionId: options.sessionId, isError, ms: Date.now() - started });
    return { content: [{ type: 'text', text }], is_error: isError };
  }

  private prepareArguments(
    tool: AgentTool,
    args: Record<string, unknown>,
    workingDirectory: string | undefined,
  ): Record<string, unknown> {
    const prepared = { ...args };
    if (!workingDirectory) return prepared;

    if ('working_directory' in tool.schema.shape) {
      prepared.working_directory = workingDirectory;
    }
    if (typeof prepared.file_path === 'string' && !isAbsolute(prepared.file_path)) {
      prepared.file_path = resolve(workingDirectory, prepared.file_path);
    }
    return prepared;
  }

  stats() {
    return {
      totalTools: this.tools.size,
      cachedTools: this.descriptors?.length ?? 0,
      toolNames: this.names,
      calls: this.calls,
      failures: this.failures,
    };
  }
}
