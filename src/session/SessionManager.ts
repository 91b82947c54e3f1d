import { randomUUID } from 'node:crypto';
import { RequestError } from '../errors.js';
import { createLogger, errorMessage, type Logger } from '../logger.js';
import type { SessionMode } from '../protocol/types.js';

export const DEFAULT_MODEL = 'qwen3:latest';
export const DEFAULT_MODE: SessionMode = 'execute';

export interface Session {
  sessionId: string;
  workingDirectory: string;
  createdAt: number;
  lastActivity: number;
  mode: SessionMode;
  model: string;
  metadata: Record<string, unknown>;
  active: boolean;
  messageCount: number;
  toolCallCount: number;
}

export type SessionPatch = Partial<Pick<Session, 'mode' | 'model' | 'metadata' | 'active' | 'messageCount' | 'toolCallCount'>>;

export interface CreateSessionOptions {
  sessionId?: string;
  metadata?: Record<string, unknown>;
  mode?: SessionMode;
  model?: string;
}

export interface SessionStats {
  activeSessions: number;
  maxSessions: number;
  totalMessages: number;
  totalToolCalls: number;
  /** Seconds. */
  sessionTimeout: number;
}

export type SessionRemovalReason = 'deleted' | 'expired' | 'shutdown';
export type SessionRemovedListener = (session: Session, reason: SessionRemovalReason) => void;

export interface SessionManagerOptions {
  /** Milliseconds of inactivity after which a session expires. */
  sessionTimeoutMs?: number;
  maxSessions?: number;
  /** Milliseconds between expiry sweeps. */
  sweepIntervalMs?: number;
  /** How many swept ids are remembered for `session expired` answers. */
  expiredMemory?: number;
  clock?: () => number;
  logger?: Logger;
}

/**
 * Registry of live sessions with admission control and periodic expiry.
 * Every mutation is synchronous, so the event loop serializes access.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly leases = new Map<string, number>();
  private readonly expired = new Set<string>();
  private readonly removedListeners = new Set<SessionRemovedListener>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | undefined;

  readonly sessionTimeoutMs: number;
  readonly maxSessions: number;
  readonly sweepIntervalMs: number;
  private readonly expiredMemory: number;

  constructor(options: SessionManagerOptions = {}) {
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 3_600_000;
    this.maxSessions = options.maxSessions ?? 100;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 300_000;
    this.expiredMemory = options.expiredMemory ?? 1024;
    this.now = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('sessions');
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Starts the expiry sweep loop. Calling it twice is a no-op. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        const cleaned = this.sweepExpired();
        if (cleaned > 0) {
          this.logger.info('session.sweep', { cleaned, remaining: this.sessions.size });
        }
      } catch (error) {
        this.logger.error('session.sweep.error', { error: errorMessage(error) });
      }
    }, this.sweepIntervalMs);
    this.timer.unref();
    this.logger.info('session.manager.started', {
      maxSessions: this.maxSessions,
      sessionTimeoutMs: this.sessionTimeoutMs,
      sweepIntervalMs: this.sweepIntervalMs,
    });
  }

  /** Stops the sweep loop and drops every session. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const session of [...this.sessions.values()]) {
      this.remove(session, 'shutdown');
    }
    this.leases.clear();
    this.logger.info('session.manager.stopped');
  }

  /**
   * Admits a new session.
   * @throws RequestError (internal error, `data.reason` = `capacity` or `duplicate`)
   */
  create(workingDirectory: string, options: CreateSessionOptions = {}): Session {
    if (this.sessions.size >= this.maxSessions) {
      this.logger.warn('session.capacity', { maxSessions: this.maxSessions });
      throw RequestError.internalError(`Maximum sessions (${this.maxSessions}) reached`, {
        reason: 'capacity',
        max_sessions: this.maxSessions,
      });
    }

    const sessionId = options.sessionId ?? randomUUID();
    if (this.sessions.has(sessionId)) {
      throw RequestError.internalError(`Session ${sessionId} already exists`, { reason: 'duplicate', session_id: sessionId });
    }

    const now = this.now();
    const session: Session = {
      sessionId,
      workingDirectory,
      createdAt: now,
      lastActivity: now,
      mode: options.mode ?? DEFAULT_MODE,
      model: options.model ?? DEFAULT_MODEL,
      metadata: options.metadata ?? {},
      active: true,
      messageCount: 0,
      toolCallCount: 0,
    };
    this.sessions.set(sessionId, session);
    this.expired.delete(sessionId);
    this.logger.info('session.created', { sessionId, workingDirectory, mode: session.mode, model: session.model });
    return session;
  }

  /** Returns an active session and refreshes its activity time. */
  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session || !session.active) return undefined;
    session.lastActivity = this.now();
    return session;
  }

  /**
   * Like {@link get} but fails with the wire error for the id:
   * `session expired` when the sweep removed it, `session not found` otherwise.
   */
  require(sessionId: string): Session {
    const session = this.get(sessionId);
    if (session) return session;
    if (this.expired.has(sessionId)) throw RequestError.sessionExpired(sessionId);
    throw RequestError.sessionNotFound(sessionId);
  }

  update(sessionId: string, patch: SessionPatch): Session | undefined {
    const session = this.get(sessionId);
    if (!session) return undefined;
    Object.assign(session, patch);
    session.lastActivity = this.now();
    this.logger.debug('session.updated', { sessionId, patch });
    return session;
  }

  delete(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.remove(session, 'deleted');
    return true;
  }

  list(): Session[] {
    return [...this.sessions.values()].filter((session) => session.active);
  }

  wasExpired(sessionId: string): boolean {
    return this.expired.has(sessionId);
  }

  /**
   * Marks a session busy for the duration of a turn; a leased session is
   * never swept. Returns the release function.
   */
  lease(sessionId: string): () => void {
    this.leases.set(sessionId, (this.leases.get(sessionId) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const count = (this.leases.get(sessionId) ?? 1) - 1;
      if (count > 0) {
        this.leases.set(sessionId, count);
      } else {
        this.leases.delete(sessionId);
      }
      const session = this.sessions.get(sessionId);
      if (session) session.lastActivity = this.now();
    };
  }

  isLeased(sessionId: string): boolean {
    return this.leases.has(sessionId);
  }

  /** Removes every unleased session idle for longer than the timeout. Returns the number removed. */
  sweepExpired(): number {
    const now = this.now();
    let cleaned = 0;
    for (const session of [...this.sessions.values()]) {
      if (this.leases.has(session.sessionId)) continue;
      if (now - session.lastActivity > this.sessionTimeoutMs) {
        this.remove(session, 'expired');
        this.rememberExpired(session.sessionId);
        cleaned++;
        this.logger.info('session.expired', { sessionId: session.sessionId, idleMs: now - session.lastActivity });
      }
    }
    return cleaned;
  }

  stats(): SessionStats {
    let totalMessages = 0;
    let totalToolCalls = 0;
    for (const session of this.sessions.values()) {
      totalMessages += session.messageCount;
      totalToolCalls += session.toolCallCount;
    }
    return {
      activeSessions: this.sessions.size,
      maxSessions: this.maxSessions,
      totalMessages,
      totalToolCalls,
      sessionTimeout: this.sessionTimeoutMs / 1000,
    };
  }

  onRemoved(listener: SessionRemovedListener): () => void {
    this.removedListeners.add(listener);
    return () => this.removedListeners.delete(listener);
  }

  private remove(session: Session, reason: SessionRemovalReason) {
    this.sessions.delete(session.sessionId);
    this.leases.delete(session.sessionId);
    session.active = false;
    if (reason === 'deleted') {
      this.logger.info('session.deleted', { sessionId: session.sessionId });
    }
    for (const listener of this.removedListeners) {
      try {
        listener(session, reason);
      } catch (error) {
        this.logger.error('session.listener.error', { sessionId: session.sessionId, error: errorMessage(error) });
      }
    }
  }

  private rememberExpired(sessionId: string) {
    this.expired.add(sessionId);
    if (this.expired.size > this.expiredMemory) {
      // Sets iterate in insertion order: drop the oldest
      const oldest = this.expired.values().next();
      if (!oldest.done) this.expired.delete(oldest.value);
    }
  }
}
