import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('uses pino-pretty when pretty: true', () => {
    vi.stubEnv('NODE_ENV', 'production')
    // The pretty transport runs in a worker, so only the level is observable.
    const logger = createLogger({ level: 'info', pretty: true })
    expect(logger.level).toBe('info')
  })

  it('logger has standard pino methods', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false })

    expect(typeof logger.info).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.child).toBe('function')
  })
})

