import { access, constants, stat } from 'node:fs/promises';
import type { GatewayConfig } from './config.js';
import type { Logger } from './logger.js';

export interface DiagnosticIssue {
  level: 'error' | 'warning' | 'info';
  category: 'platform' | 'configuration';
  message: string;
  solution?: string;
}

export type DiagnosticReport = {
  node: string;
  platform: string;
  arch: string;
  memory: { rssMB: number; heapUsedMB: number; heapTotalMB: number };
  config: {
    transport: GatewayConfig['transport'];
    endpoint?: string;
    workingDirectory: string;
    logLevel: string;
    model: string;
    models: string[];
    llmBaseUrl: string;
    maxSessions: number;
    sessionTimeout: number;
    toolErrorHeuristic: boolean;
  };
  issues: DiagnosticIssue[];
  compatible: boolean;
};

const mb = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

export async function checkWorkingDirectory(dir: string): Promise<DiagnosticIssue | undefined> {
  try {
    if (!(await stat(dir)).isDirectory()) {
      return { level: 'error', category: 'configuration', message: `Working directory is not a directory: ${dir}` };
    }
    await access(dir, constants.R_OK | constants.W_OK);
    return undefined;
  } catch {
    return {
      level: 'error',
      category: 'configuration',
      message: `Working directory is not accessible: ${dir}`,
      solution: 'Set ACP_WORKING_DIR or --working-dir to a readable, writable directory',
    };
  }
}

export function checkNodeVersion(version: string = process.version): DiagnosticIssue | undefined {
  const major = Number.parseInt(version.replace(/^v/, '').split('.')[0] ?? '', 10);
  if (Number.isNaN(major) || major < 20) {
    return {
      level: 'error',
      category: 'platform',
      message: `Node.js ${version} is not supported`,
      solution: 'Install Node.js 20 or newer',
    };
  }
  return undefined;
}

export async function runDiagnostics(log: Logger, config: GatewayConfig): Promise<DiagnosticReport> {
  const mem = process.memoryUsage();
  const issues = [checkNodeVersion(), await checkWorkingDirectory(config.workingDirectory)].filter(
    (issue): issue is DiagnosticIssue => issue !== undefined,
  );
  if (config.apiKey === 'ollama' && !config.llmBaseUrl.includes('localhost') && !config.llmBaseUrl.includes('127.0.0.1')) {
    issues.push({
      level: 'warning',
      category: 'configuration',
      message: 'A remote LLM endpoint is configured without OPENAI_API_KEY',
    });
  }

  const report: DiagnosticReport = {
    node: process.version,
    platform: process.platform,
    arch: process.arch,
    memory: {
      rssMB: mb(mem.rss),
      heapUsedMB: mb(mem.heapUsed),
      heapTotalMB: mb(mem.heapTotal),
    },
    config: {
      transport: config.transport,
      endpoint: config.transport === 'websocket' ? `ws://${config.host}:${config.port}/ws` : undefined,
      workingDirectory: config.workingDirectory,
      logLevel: config.logLevel,
      model: config.model,
      models: config.models,
      llmBaseUrl: config.llmBaseUrl,
      maxSessions: config.maxSessions,
      sessionTimeout: config.sessionTimeout,
      toolErrorHeuristic: config.toolErrorHeuristic,
    },
    issues,
    compatible: issues.every((issue) => issue.level !== 'error'),
  };
  log.info('diagnostics.report', { compatible: report.compatible, issues: issues.length });
  return report;
}
