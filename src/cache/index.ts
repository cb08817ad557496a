import { Redis } from 'ioredis'
import type { Logger } from '../lib/logger.js'

/** Every key this service reads or writes lives under this prefix. */
export const CACHE_KEY_PREFIX = 'forum:'

export function createCache(valkeyUrl: string, logger: Logger) {
  const cache = new Redis(valkeyUrl, {
    keyPrefix: CACHE_KEY_PREFIX,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number) {
      return Math.min(times * 200, 2000)
    },
    lazyConnect: true,
  })

  cache.on('error', (err: Error) => {
    logger.error({ err }, 'Valkey connection error')
  })

  cache.on('ready', () => {
    logger.info('Connected to Valkey')
  })

  return cache
}

export type Cache = ReturnType<typeof createCache>

/** The subset of the cache client the rate limiter and job keys need. */
export type CounterStore = Pick<Cache, 'get' | 'set' | 'del' | 'incr' | 'decr' | 'expire'>
