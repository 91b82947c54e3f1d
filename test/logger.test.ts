import { describe, it, expect } from 'vitest'
import { Logger, errorMessage, isLogLevel } from '../src/logger.js'

describe('Logger', () => {
  const collecting = (level: 'error' | 'warn' | 'info' | 'debug' | 'trace' = 'info') => {
    const lines: string[] = []
    return { logger: new Logger({ level, component: 'root', sink: (line) => lines.push(line) }), lines }
  }

  it('should write one JSON line per entry', () => {
    const { logger, lines } = collecting()
    logger.info('session.created', { sessionId: 's1' })
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'info',
      component: 'root',
      msg: 'session.created',
      data: { sessionId: 's1' },
    })
  })

  it('should drop entries below the configured level', () => {
    const { logger, lines } = collecting('warn')
    logger.info('hidden')
    logger.debug('hidden')
    logger.warn('shown')
    logger.error('shown too')
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['shown', 'shown too'])
  })

  it('should tag children with their component and share the level', () => {
    const { logger, lines } = collecting('info')
    const child = logger.child('rpc')
    child.debug('hidden')
    logger.setLevel('debug')
    child.debug('visible')
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({ component: 'rpc', msg: 'visible', level: 'debug' }),
    ])
    expect(child.level).toBe('debug')
  })

  it('should keep recent entries in a ring', () => {
    const logger = new Logger({ level: 'info', capacity: 64, sink: () => {} })
    for (let i = 0; i < 70; i++) logger.info(`entry-${i}`)
    const entries = logger.flush()
    expect(entries).toHaveLength(64)
    expect(entries[0]?.msg).toBe('entry-6')
    expect(entries.at(-1)?.msg).toBe('entry-69')
  })

  it('should redirect output through a new sink', () => {
    const { logger } = collecting()
    const redirected: string[] = []
    logger.child('io').setSink((line) => redirected.push(line))
    logger.info('after')
    expect(redirected).toHaveLength(1)
  })
})

describe('logger helpers', () => {
  it('should recognise level names', () => {
    expect(isLogLevel('trace')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })

  it('should extract error messages', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})
