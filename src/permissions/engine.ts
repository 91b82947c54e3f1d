import { createLogger, type Logger } from '../logger.js';
import type { SessionMode } from '../protocol/types.js';

export const PERMISSION_KINDS = ['read', 'write', 'exec', 'network', 'other'] as const;
export type PermissionKind = (typeof PERMISSION_KINDS)[number];

export type PermissionRequest = {
  kind: PermissionKind;
  mode: SessionMode;
  resource?: string;
  metadata?: Record<string, unknown>;
};

export type PermissionDecision = {
  allow: boolean;
  reason?: string;
};

/**
 * Decides whether a tool of a given kind may run in a session mode.
 * - execute: everything
 * - safe: no command execution or network access
 * - plan: read-only
 */
export class PermissionEngine {
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? createLogger('permissions');
  }

  decide(req: PermissionRequest): PermissionDecision {
    const decision = this.evaluate(req);
    if (!decision.allow) {
      this.log.debug('perm.denied', { kind: req.kind, mode: req.mode, resource: req.resource, reason: decision.reason });
    }
    return decision;
  }

  private evaluate(req: PermissionRequest): PermissionDecision {
    switch (req.mode) {
      case 'execute':
        return { allow: true, reason: 'execute-mode' };
      case 'safe':
        if (req.kind === 'exec' || req.kind === 'network') {
          return { allow: false, reason: `${req.kind} operations are disabled in safe mode` };
        }
        return { allow: true, reason: 'safe-mode' };
      case 'plan':
        if (req.kind === 'read' || req.kind === 'other') return { allow: true, reason: 'plan-read' };
        return { allow: false, reason: `${req.kind} operations are disabled in plan mode` };
    }
  }
}
