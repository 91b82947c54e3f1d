import { bashTool } from './bash.js';
import { editTool } from './edit.js';
import { taskDoneTool } from './task-done.js';
import { sequentialThinkingTool } from './thinking.js';
import type { AgentTool } from './types.js';

export { bashTool, runShell, BASH_TIMEOUT_MS } from './bash.js';
export { editTool } from './edit.js';
export { sequentialThinkingTool, formatThought } from './thinking.js';
export { taskDoneTool, TASK_DONE_TOOL } from './task-done.js';
export { ToolRegistry, classifyToolOutput, describeTool, looksLikeFailure } from './ToolRegistry.js';
export type { ToolCallOptions, ToolRegistryOptions } from './ToolRegistry.js';
export { defineTool } from './types.js';
export type { AgentTool, ToolContext, ToolOutput } from './types.js';

export function defaultTools(): AgentTool[] {
  return [bashTool, editTool, sequentialThinkingTool, taskDoneTool];
}
