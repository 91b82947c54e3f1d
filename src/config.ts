import { resolve } from 'node:path';
import { z } from 'zod';

export const DEFAULT_MODELS = ['qwen3:latest', 'gpt-4', 'claude-3-sonnet'];

const bool = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'], { message: 'expected true or false' })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const positiveSeconds = z.coerce.number().positive();

const configSchema = z.object({
  transport: z.enum(['stdio', 'websocket']),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  workingDirectory: z.string().min(1),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']),
  debug: bool,
  logFile: z.string().min(1).optional(),
  sessionTimeout: positiveSeconds,
  maxSessions: positiveInt,
  sweepInterval: positiveSeconds,
  requestTimeout: positiveSeconds,
  model: z.string().min(1),
  models: z
    .string()
    .transform((list) => list.split(',').map((m) => m.trim()).filter((m) => m.length > 0))
    .pipe(z.array(z.string()).min(1, 'at least one model is required')),
  llmBaseUrl: z.string().url(),
  apiKey: z.string().min(1),
  maxSteps: positiveInt,
  toolErrorHeuristic: bool,
  strictProtocolVersion: bool,
  diagnose: z.boolean(),
  help: z.boolean(),
});

export type GatewayConfig = z.infer<typeof configSchema>;
type ConfigKey = keyof GatewayConfig;

type SettingSource = { env?: string; flag?: string; fallback?: string };

const SETTINGS: Record<Exclude<ConfigKey, 'diagnose' | 'help'>, SettingSource> = {
  transport: { env: 'ACP_TRANSPORT', flag: '--transport', fallback: 'websocket' },
  host: { env: 'ACP_HOST', flag: '--host', fallback: '0.0.0.0' },
  port: { env: 'ACP_PORT', flag: '--port', fallback: '8095' },
  workingDirectory: { env: 'ACP_WORKING_DIR', flag: '--working-dir' },
  logLevel: { env: 'ACP_LOG_LEVEL', flag: '--log-level', fallback: 'info' },
  debug: { env: 'ACP_DEBUG', fallback: 'false' },
  logFile: { env: 'ACP_LOG_FILE' },
  sessionTimeout: { env: 'ACP_SESSION_TIMEOUT', flag: '--session-timeout', fallback: '3600' },
  maxSessions: { env: 'ACP_MAX_SESSIONS', flag: '--max-sessions', fallback: '100' },
  sweepInterval: { env: 'ACP_SWEEP_INTERVAL', fallback: '300' },
  requestTimeout: { env: 'ACP_REQUEST_TIMEOUT', fallback: '30' },
  model: { env: 'ACP_MODEL', flag: '--model', fallback: 'qwen3:latest' },
  models: { env: 'ACP_MODELS', fallback: DEFAULT_MODELS.join(',') },
  llmBaseUrl: { env: 'ACP_LLM_BASE_URL', fallback: 'http://localhost:11434/v1' },
  apiKey: { env: 'OPENAI_API_KEY', fallback: 'ollama' },
  maxSteps: { env: 'ACP_MAX_STEPS', fallback: '50' },
  toolErrorHeuristic: { env: 'ACP_TOOL_ERROR_HEURISTIC', fallback: 'true' },
  strictProtocolVersion: { env: 'ACP_STRICT_PROTOCOL_VERSION', fallback: 'false' },
};

const SWITCHES = new Set(['--diagnose', '--diagnostics', '--help', '-h']);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Splits argv into `--flag value` / `--flag=value` pairs and bare switches. */
export function parseArgs(argv: readonly string[]): { flags: Map<string, string>; switches: Set<string> } {
  const known = new Set(Object.values(SETTINGS).flatMap((s) => (s.flag ? [s.flag] : [])));
  const flags = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (SWITCHES.has(arg)) {
      switches.add(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!known.has(name)) {
      throw new ConfigError(`Unknown option: ${name}`);
    }
    const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
    if (value === undefined || (eq === -1 && value.startsWith('--'))) {
      throw new ConfigError(`Missing value for ${name}`);
    }
    flags.set(name, value);
  }
  return { flags, switches };
}

const SETTING_SOURCES = new Map<string, SettingSource>(Object.entries(SETTINGS));

function describeSetting(key: string): string {
  const source = SETTING_SOURCES.get(key);
  const names = [source?.flag, source?.env].filter((n): n is string => Boolean(n));
  return names.length > 0 ? `${key} (${names.join(' / ')})` : key;
}

/**
 * Resolves the gateway settings: CLI flags override environment variables,
 * which override defaults.
 * @throws ConfigError naming the offending setting
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): GatewayConfig {
  const { flags, switches } = parseArgs(argv);
  const raw: Record<string, unknown> = {
    diagnose: switches.has('--diagnose') || switches.has('--diagnostics'),
    help: switches.has('--help') || switches.has('-h'),
  };

  for (const [key, source] of SETTING_SOURCES) {
    const fromFlag = source.flag ? flags.get(source.flag) : undefined;
    const fromEnv = source.env ? env[source.env] : undefined;
    const value = fromFlag ?? (fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined) ?? source.fallback;
    if (value !== undefined) raw[key] = value;
  }
  raw.workingDirectory ??= cwd;

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${describeSetting(String(issue.path[0] ?? ''))}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const config = parsed.data;
  config.workingDirectory = resolve(cwd, config.workingDirectory);
  if (config.debug) config.logLevel = 'debug';
  if (!config.models.includes(config.model)) config.models = [config.model, ...config.models];
  return config;
}

export const USAGE = `Usage: acp-gateway [options]

Options:
  --transport <stdio|websocket>   Transport to serve (ACP_TRANSPORT, default websocket)
  --host <host>                   WebSocket bind address (ACP_HOST, default 0.0.0.0)
  --port <port>                   WebSocket port (ACP_PORT, default 8095)
  --working-dir <dir>             Default session working directory (ACP_WORKING_DIR)
  --log-level <level>             error | warn | info | debug | trace (ACP_LOG_LEVEL)
  --session-timeout <seconds>     Idle time before a session expires (ACP_SESSION_TIMEOUT)
  --max-sessions <n>              Concurrent session limit (ACP_MAX_SESSIONS)
  --model <name>                  Default model for new sessions (ACP_MODEL)
  --diagnose                      Print a diagnostics report and exit
  --help                          Show this help
`;
