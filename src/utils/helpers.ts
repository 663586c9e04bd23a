/**
 * General utility helpers for threadsmith
 */

import { randomUUID } from 'crypto'

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number
  /** Delay before the second attempt; doubles for each one after (default: 100) */
  baseDelayMs?: number
  /** Errors for which this returns false are rethrown at once */
  shouldRetry?: (error: Error) => boolean
  /** Called before each backoff sleep */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
}

/**
 * Retry an async operation with exponential backoff.
 * Rethrows the last error once the attempts are used up.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3)
  const baseDelayMs = options.baseDelayMs ?? 100
  const wait = options.sleep ?? sleep

  let lastError: Error | undefined
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      if (options.shouldRetry !== undefined && !options.shouldRetry(lastError)) {
        throw lastError
      }
      if (attempt < maxAttempts) {
        const delayMs = baseDelayMs * Math.pow(2, attempt - 1)
        options.onRetry?.(lastError, attempt, delayMs)
        await wait(delayMs)
      }
    }
  }
  throw lastError ?? new Error('Operation failed after retries')
}
