import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../logger.js';
import { defineTool, type ToolOutput } from './types.js';

const schema = z.object({
  command: z.enum(['view', 'create', 'str_replace', 'insert']).describe('Operation to perform'),
  file_path: z.string().min(1).describe('Path of the file or directory; relative paths resolve against the session working directory'),
  old_str: z.string().optional().describe('Exact text to replace (str_replace)'),
  new_str: z.string().optional().describe('Replacement text (str_replace)'),
  text: z.string().optional().describe('File content (create) or line to insert (insert)'),
  line_number: z.number().int().optional().describe('Insert after this 1-based line (insert)'),
});

type EditArgs = z.infer<typeof schema>;

const failure = (text: string): ToolOutput => ({ text, isError: true });
const success = (text: string): ToolOutput => ({ text, isError: false });

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function viewDirectory(path: string): Promise<ToolOutput> {
  const items: string[] = [];
  const entries = await readdir(path, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (entry.name.startsWith('.')) continue;
    if (!entry.isDirectory()) {
      items.push(entry.name);
      continue;
    }
    items.push(`${entry.name}/`);
    try {
      const children = await readdir(join(path, entry.name), { withFileTypes: true });
      for (const child of children.sort((a, b) => a.name.localeCompare(b.name))) {
        if (child.name.startsWith('.')) continue;
        items.push(`  ${child.name}${child.isDirectory() ? '/' : ''}`);
      }
    } catch {
      items.push('  [Permission denied]');
    }
  }
  return success(items.length > 0 ? items.join('\n') : 'Directory is empty');
}

async function view(path: string): Promise<ToolOutput> {
  if (!(await exists(path))) return failure(`File not found: ${path}`);
  if ((await stat(path)).isDirectory()) return viewDirectory(path);
  const lines = (await readFile(path, 'utf8')).split('\n');
  return success(lines.map((line, i) => `${String(i + 1).padStart(4)} | ${line}`).join('\n'));
}

async function create(path: string, text: string | undefined): Promise<ToolOutput> {
  if (await exists(path)) return failure(`File already exists: ${path}`);
  if (text === undefined) return failure('Text content is required for create operation');
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf8');
  return success(`File created: ${path}`);
}

async function replace(path: string, oldStr: string | undefined, newStr: string | undefined): Promise<ToolOutput> {
  if (!(await exists(path))) return failure(`File not found: ${path}`);
  if (oldStr === undefined || newStr === undefined) {
    return failure('Both old_str and new_str are required for str_replace operation');
  }
  const content = await readFile(path, 'utf8');
  const occurrences = content.split(oldStr).length - 1;
  if (occurrences === 0) return failure(`String not found in file: ${oldStr}`);
  if (occurrences > 1) return failure(`String occurs ${occurrences} times in file; it must be unique: ${oldStr}`);
  await writeFile(path, content.replace(oldStr, () => newStr), 'utf8');
  return success(`String replaced in file: ${path}`);
}

async function insert(path: string, lineNumber: number | undefined, text: string | undefined): Promise<ToolOutput> {
  if (!(await exists(path))) return failure(`File not found: ${path}`);
  if (lineNumber === undefined) return failure('Line number is required for insert operation');
  if (text === undefined) return failure('Text content is required for insert operation');
  const lines = (await readFile(path, 'utf8')).split('\n');
  if (lineNumber < 1 || lineNumber > lines.length) {
    return failure(`Line number ${lineNumber} is out of range (1-${lines.length})`);
  }
  lines.splice(lineNumber, 0, text);
  await writeFile(path, lines.join('\n'), 'utf8');
  return success(`Text inserted after line ${lineNumber} in file: ${path}`);
}

async function edit(args: EditArgs): Promise<ToolOutput> {
  try {
    switch (args.command) {
      case 'view':
        return await view(args.file_path);
      case 'create':
        return await create(args.file_path, args.text);
      case 'str_replace':
        return await replace(args.file_path, args.old_str, args.new_str);
      case 'insert':
        return await insert(args.file_path, args.line_number, args.text);
    }
  } catch (error) {
    return failure(`Error: ${errorMessage(error)}`);
  }
}

export const editTool = defineTool({
  name: 'edit_tool',
  description: [
    'View, create and edit files.',
    '- view: file contents with line numbers, or a directory listing two levels deep',
    '- create: write a new file (fails if it exists)',
    '- str_replace: replace an exact, unique string',
    '- insert: insert text after a line number',
  ].join('\n'),
  kind: 'write',
  kindOf: (args) => (args.command === 'view' ? 'read' : 'write'),
  schema,
  invoke: (args) => edit(args),
});
