import { z } from 'zod';
import { defineTool } from './types.js';

export const TASK_DONE_TOOL = 'task_done';

/** Ends the agent turn. Call only after the work has been verified. */
export const taskDoneTool = defineTool({
  name: TASK_DONE_TOOL,
  description: 'Signal task completion. Only call this after verifying the task is actually done.',
  kind: 'other',
  schema: z.object({}),
  invoke: async () => ({ text: 'Task done.', isError: false }),
});
