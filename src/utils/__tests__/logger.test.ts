/**
 * Unit tests for src/utils/logger.ts: Pino configuration, level changes and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets } from '../../cli/utils/masking.js'
import { createLogger, childLogger, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create a synchronous in-memory pino logger that writes JSON to a buffer.
 * Uses pino.destination({ sync: true }) pattern via the stream overload.
 */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(logger).toBeDefined()
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.error).toBe('function')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'warn'
      const logger = createLogger('test-level', { pretty: false })
      expect(logger.level).toBe('warn')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })

  it('uses info level when NODE_ENV = production', () => {
    const originalEnv = process.env.NODE_ENV
    const originalLevel = process.env.LOG_LEVEL
    try {
      process.env.NODE_ENV = 'production'
      delete process.env.LOG_LEVEL
      const logger = createLogger('test-prod', { pretty: false })
      expect(logger.level).toBe('info')
    } finally {
      process.env.NODE_ENV = originalEnv
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = originalLevel
      }
    }
  })
})

describe('childLogger', () => {
  it('returns a child logger with runId binding', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { runId: 'run-1' })
    expect(child).toBeDefined()
    expect(typeof child.info).toBe('function')
    // Child logger should be a different object from parent
    expect(child).not.toBe(parent)
  })
})

describe('setLogLevel', () => {
  it('changes the level of loggers created earlier', () => {
    const original = process.env.LOG_LEVEL
    try {
      delete process.env.LOG_LEVEL
      const logger = createLogger('set-level', { level: 'warn', pretty: false })
      setLogLevel('debug')
      expect(logger.level).toBe('debug')
    } finally {
      if (original !== undefined) process.env.LOG_LEVEL = original
    }
  })

  it('leaves levels alone when LOG_LEVEL is set', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'error'
      const logger = createLogger('env-level', { pretty: false })
      setLogLevel('trace')
      expect(logger.level).toBe('error')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })
})

describe('Pino redaction with PINO_REDACT_PATHS', () => {
  it('covers API key fields and authorization headers', () => {
    expect(PINO_REDACT_PATHS).toEqual([
      'apiKey',
      'api_key',
      '*.apiKey',
      '*.api_key',
      'headers.authorization',
      '*.headers.authorization',
    ])
  })

  it('redacts apiKey field in log output', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ apiKey: 'test-secret' }, 'test redaction')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '{}')
    expect(parsed).toHaveProperty('apiKey', '[Redacted]')
  })

  it('redacts nested authorization headers', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ request: { headers: { authorization: 'Bearer test-secret' } } }, 'should be redacted')

    const parsed: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(parsed).toHaveProperty(['request', 'headers', 'authorization'], '[Redacted]')
  })
})

describe('maskSecrets', () => {
  it('masks an sk- style key', () => {
    expect(maskSecrets('sk-test-placeholder-000000000000')).toBe('***')
  })

  it('returns input unchanged when no secrets present', () => {
    const input = 'no secrets here'
    expect(maskSecrets(input)).toBe(input)
  })

  it('masks a bearer token inside a longer message', () => {
    const input = 'Request failed with header Bearer test-secret-token-0000 attached'
    expect(maskSecrets(input)).toBe('Request failed with header *** attached')
  })
})
