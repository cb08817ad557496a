import type { CounterStore } from '../cache/index.js'
import { tooManyRequests } from '../lib/api-errors.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimiter {
  /** Consume one credit; throws 429 when the cap is already reached. */
  performed(): Promise<void>
  /** Give one credit back (an undone action). Never goes below zero. */
  rollback(): Promise<void>
}

export interface RateLimitSpec {
  userId: number
  action: string
  max: number
  windowSeconds: number
}

export type RateLimiterFactory = (spec: RateLimitSpec) => RateLimiter

export const ONE_DAY_SECONDS = 86_400

/** UTC calendar day, used to key per-day limits. */
export function dayKey(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Counter-based limiter on Valkey. The key embeds the action (which carries
 * the day for per-day limits), so each window starts from zero; the TTL only
 * cleans up.
 */
export function createRateLimiterFactory(store: CounterStore): RateLimiterFactory {
  return ({ userId, action, max, windowSeconds }) => {
    const key = `ratelimit:${String(userId)}:${action}`

    return {
      async performed(): Promise<void> {
        const count = await store.incr(key)
        if (count === 1) {
          await store.expire(key, windowSeconds)
        }
        if (count > max) {
          await store.decr(key)
          throw tooManyRequests(`Limit of ${String(max)} reached for ${action}`)
        }
      },

      async rollback(): Promise<void> {
        const count = await store.decr(key)
        if (count < 0) {
          await store.set(key, '0', 'EX', windowSeconds)
        }
      },
    }
  }
}

/** Per-day limiter keyed by action name and UTC day. */
export function dailyLimit(
  factory: RateLimiterFactory,
  userId: number,
  action: string,
  max: number,
  now: Date = new Date()
): RateLimiter {
  return factory({ userId, action: `${action}:${dayKey(now)}`, max, windowSeconds: ONE_DAY_SECONDS })
}
