import { describe, it, expect } from 'vitest'
import { PERMISSION_KINDS, PermissionEngine } from '../src/permissions/engine.js'
import { quietLogger } from './helpers.js'

describe('PermissionEngine', () => {
  const engine = new PermissionEngine(quietLogger())
  const allowed = (mode: 'execute' | 'safe' | 'plan') =>
    PERMISSION_KINDS.filter((kind) => engine.decide({ kind, mode }).allow)

  it('should allow everything in execute mode', () => {
    expect(allowed('execute')).toEqual(['read', 'write', 'exec', 'network', 'other'])
  })

  it('should block command execution and network access in safe mode', () => {
    expect(allowed('safe')).toEqual(['read', 'write', 'other'])
    expect(engine.decide({ kind: 'exec', mode: 'safe', resource: 'bash_tool' })).toEqual({
      allow: false,
      reason: 'exec operations are disabled in safe mode',
    })
  })

  it('should only allow reads in plan mode', () => {
    expect(allowed('plan')).toEqual(['read', 'other'])
    expect(engine.decide({ kind: 'write', mode: 'plan' })).toEqual({
      allow: false,
      reason: 'write operations are disabled in plan mode',
    })
  })
})
