import { createWriteStream } from 'node:fs';
import { resolve } from 'node:path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export type LogEntry = {
  ts: number;
  level: LogLevel;
  component: string;
  msg: string;
  data?: Record<string, unknown>;
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  capacity?: number;
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/** State shared by a root logger and all of its children. */
export class LogState {
  readonly entries: Array<LogEntry | undefined>;
  index = 0;

  constructor(
    readonly capacity: number,
    public level: LogLevel,
    public sink: LogSink,
  ) {
    this.entries = new Array<LogEntry | undefined>(capacity);
  }

  push(entry: LogEntry) {
    this.entries[this.index] = entry;
    this.index = (this.index + 1) % this.capacity;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Structured JSON-lines logger with level filtering and a bounded in-memory ring.
 * Lines go to stderr by default: stdout belongs to the stdio transport.
 */
export class Logger {
  private readonly state: LogState;
  private readonly component: string;

  constructor({ level = 'info', component = 'acp', capacity = 1024, sink }: LoggerOptions = {}, state?: LogState) {
    this.state = state ?? new LogState(
      Math.max(64, capacity | 0),
      level,
      sink ?? ((line) => process.stderr.write(line + '\n')),
    );
    this.component = component;
  }

  get level(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  setSink(sink: LogSink) {
    this.state.sink = sink;
  }

  /** Derives a logger tagged with another component that shares level, sink and ring. */
  child(component: string): Logger {
    return new Logger({ component }, this.state);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.state.level];
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = data
      ? { ts: Date.now(), level, component: this.component, msg, data }
      : { ts: Date.now(), level, component: this.component, msg };
    this.state.push(entry);
    this.state.sink(JSON.stringify(entry));
  }

  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  trace(msg: string, data?: Record<string, unknown>) { this.log('trace', msg, data); }

  flush(): LogEntry[] {
    // Returns a copy in chronological order
    const out: LogEntry[] = [];
    for (let i = 0; i < this.state.capacity; i++) {
      const v = this.state.entries[(this.state.index + i) % this.state.capacity];
      if (v) out.push(v);
    }
    return out;
  }
}

const rootLogger = new Logger({
  level: process.env.ACP_DEBUG === 'true' ? 'debug' : isLogLevel(process.env.ACP_LOG_LEVEL) ? process.env.ACP_LOG_LEVEL : 'info',
});

/**
 * Applies process-wide logging settings. When `file` is given every line is
 * also appended to it; a failing file stream falls back to stderr only.
 */
export function configureLogging({ level, file }: { level?: LogLevel; file?: string } = {}): Logger {
  if (level) rootLogger.setLevel(level);
  if (file) {
    const stream = createWriteStream(resolve(file), { flags: 'a' });
    let fileOk = true;
    stream.on('error', (error) => {
      fileOk = false;
      process.stderr.write(`[logger] log file error: ${error.message}\n`);
    });
    rootLogger.setSink((line) => {
      process.stderr.write(line + '\n');
      if (fileOk) stream.write(line + '\n');
    });
  }
  return rootLogger;
}

// Factory function for consistent logger creation
export function createLogger(component: string): Logger {
  return rootLogger.child(component);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
