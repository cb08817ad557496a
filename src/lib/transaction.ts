import type { Executor, Transaction } from '../db/index.js'

/** Postgres SQLSTATEs that mean "run the whole transaction again". */
const RETRYABLE_CODES = new Set(['40001', '40P01'])

export const UNIQUE_VIOLATION = '23505'

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_BASE_DELAY_MS = 20
const MAX_BACKOFF_MS = 1000

export interface RetryOptions {
  maxAttempts?: number
  baseDelayMs?: number
  random?: () => number // injectable for testing
  sleep?: (ms: number) => Promise<void>
}

/**
 * Read the SQLSTATE of a database error. Drizzle wraps driver errors, so the
 * code may sit on the error itself or on its cause.
 */
export function pgErrorCode(err: unknown): string | undefined {
  let current: unknown = err
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }
    current = 'cause' in current ? current.cause : undefined
  }
  return undefined
}

export function isRetryableTransactionError(err: unknown): boolean {
  const code = pgErrorCode(err)
  return code !== undefined && RETRYABLE_CODES.has(code)
}

/**
 * Calculates exponential backoff with jitter.
 *
 * Formula: base * 2^(attempt-1) + random(0, base)
 */
export function calculateBackoffMs(baseMs: number, attempt: number, random: () => number): number {
  const exponential = baseMs * Math.pow(2, attempt - 1)
  return Math.min(exponential + random() * baseMs, MAX_BACKOFF_MS)
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Run `fn` in a transaction, starting over when Postgres reports a
 * serialization failure or deadlock. Any other error propagates unchanged.
 * Callers must keep side effects outside `fn`; it may run more than once.
 */
export async function runInTransaction<T>(
  db: Executor,
  fn: (tx: Transaction) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    random = Math.random,
    sleep = defaultSleep,
  } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await db.transaction(fn)
    } catch (err: unknown) {
      if (attempt >= maxAttempts || !isRetryableTransactionError(err)) {
        throw err
      }
      await sleep(calculateBackoffMs(baseDelayMs, attempt, random))
    }
  }
}
