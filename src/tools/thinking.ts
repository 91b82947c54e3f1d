import { z } from 'zod';
import { defineTool } from './types.js';

const schema = z.object({
  thought: z.string().describe('Current thinking step'),
  thought_number: z.number().int().min(1).describe('Current number in sequence'),
  total_thoughts: z.number().int().min(1).describe('Current estimate of thoughts needed'),
  next_thought_needed: z.boolean().describe('True if more thoughts are needed'),
  is_revision: z.boolean().optional().describe('True if this thought revises a previous one'),
  revises_thought: z.number().int().optional().describe('Number of the thought being revised'),
  branch_from_thought: z.number().int().optional().describe('Number of the thought this branches from'),
  branch_id: z.string().optional().describe('Identifier of this branch of thinking'),
});

export function formatThought(args: z.infer<typeof schema>): string {
  const parts = [
    `THOUGHT [${args.thought_number}/${args.total_thoughts}]:`,
    args.thought,
    `Next thought needed: ${args.next_thought_needed}`,
  ];
  if (args.is_revision) parts.push(`Revision of thought #${args.revises_thought ?? '?'}`);
  if (args.branch_from_thought) parts.push(`Branching from thought #${args.branch_from_thought}`);
  if (args.branch_id) parts.push(`Branch ID: ${args.branch_id}`);
  return parts.join('\n');
}

export const sequentialThinkingTool = defineTool({
  name: 'sequential_thinking',
  description: [
    'Reflective problem solving through numbered thoughts.',
    'Thoughts may revise earlier ones or branch; adjust total_thoughts as understanding changes.',
  ].join('\n'),
  kind: 'other',
  schema,
  invoke: async (args) => ({ text: formatThought(args), isError: false }),
});
