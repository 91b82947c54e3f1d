import type { z } from 'zod';
import type { Logger } from '../logger.js';
import type { PermissionKind } from '../permissions/engine.js';

/** What a tool hands back: plain text, or text with an explicit error flag. */
export type ToolOutput = string | { text: string; isError?: boolean };

export interface ToolContext {
  sessionId?: string;
  workingDirectory?: string;
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * A tool the agent (or a client through `tools/call`) can invoke.
 * Arguments are validated against `schema` before `invoke` runs.
 */
export interface AgentTool<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  /** Permission class checked against the session mode. */
  readonly kind: PermissionKind;
  /** Narrows `kind` for one call from its raw arguments. */
  kindOf?(args: Record<string, unknown>): PermissionKind;
  readonly schema: S;
  invoke(args: z.infer<S>, context: ToolContext): Promise<ToolOutput>;
}

export function defineTool<S extends z.AnyZodObject>(tool: AgentTool<S>): AgentTool {
  return tool;
}
