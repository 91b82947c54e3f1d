import { spawn } from 'node:child_process';
import { z } from 'zod';
import { defineTool, type ToolOutput } from './types.js';

export const BASH_TIMEOUT_MS = 30_000;

const schema = z.object({
  command: z.string().min(1).describe('The shell command to execute'),
  working_directory: z.string().optional().describe('Directory to run the command in; injected from the session'),
});

/** Runs `command` through /bin/sh and resolves with stdout, plus stderr under a `STDERR:` marker. */
export function runShell(
  command: string,
  options: { cwd?: string; timeoutMs?: number; signal?: AbortSignal } = {},
): Promise<ToolOutput> {
  const timeoutMs = options.timeoutMs ?? BASH_TIMEOUT_MS;

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    const finish = (output: ToolOutput) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(output);
    };

    const child = spawn('/bin/sh', ['-c', command], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => (stdout += chunk));
    child.stderr.on('data', (chunk: string) => (stderr += chunk));

    child.on('error', (error) => {
      if (error.name === 'AbortError') {
        finish({ text: 'Error: Command cancelled', isError: true });
        return;
      }
      finish({ text: `Error executing command: ${error.message}`, isError: true });
    });

    child.on('close', () => {
      if (timedOut) {
        finish(`Error: Command timed out after ${Math.round(timeoutMs / 1000)} seconds`);
        return;
      }
      finish(stderr ? `${stdout}\nSTDERR:\n${stderr}` : stdout);
    });
  });
}

export const bashTool = defineTool({
  name: 'bash_tool',
  description: [
    'Execute shell commands synchronously.',
    'Each command runs in a fresh subprocess in the session working directory and is killed after 30 seconds.',
    'Avoid commands with excessive output; prefer relative paths.',
  ].join('\n'),
  kind: 'exec',
  schema,
  invoke: (args, context) =>
    runShell(args.command, { cwd: args.working_directory ?? context.workingDirectory, signal: context.signal }),
});
