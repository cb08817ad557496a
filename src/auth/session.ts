import crypto from 'node:crypto'
import { z } from 'zod/v4'
import type { Cache } from '../cache/index.js'
import type { Logger } from '../lib/logger.js'

// ---------------------------------------------------------------------------
// Key prefixes
// ---------------------------------------------------------------------------

// Written by the account service; the cache client adds the shared key prefix
const SESSION_DATA_PREFIX = 'session:data:'
const ACCESS_TOKEN_PREFIX = 'session:access:'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const sessionSchema = z.object({
  /** Unique session identifier */
  sid: z.string().min(1),
  userId: z.number().int(),
  username: z.string().min(1),
  admin: z.boolean().default(false),
  moderator: z.boolean().default(false),
  /** When the access token expires (epoch ms) */
  accessTokenExpiresAt: z.number(),
})

/** Session data stored in Valkey by the account service. */
export type Session = z.infer<typeof sessionSchema>

export interface SessionService {
  /**
   * Validate an access token. Returns the session if valid, undefined if invalid/expired.
   * Looks up by access token hash, then fetches full session data.
   */
  validateAccessToken(accessToken: string): Promise<Session | undefined>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** SHA-256 hash a value and return the hex digest. */
export function sha256(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex')
}

/** Truncate a hash to 8 characters for safe logging. */
function truncateForLog(value: string): string {
  return value.slice(0, 8)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createSessionService(
  cache: Pick<Cache, 'get'>,
  logger: Logger,
  now: () => number = Date.now
): SessionService {
  async function validateAccessToken(accessToken: string): Promise<Session | undefined> {
    const tokenHash = sha256(accessToken)

    try {
      // Look up session ID by access token hash
      const sid = await cache.get(`${ACCESS_TOKEN_PREFIX}${tokenHash}`)
      if (sid === null) {
        logger.debug({ tokenHash: truncateForLog(tokenHash) }, 'Access token not found')
        return undefined
      }

      // Fetch full session data
      const data = await cache.get(`${SESSION_DATA_PREFIX}${sid}`)
      if (data === null) {
        logger.debug(
          { sid: truncateForLog(sid), tokenHash: truncateForLog(tokenHash) },
          'Session data not found (orphaned token)'
        )
        return undefined
      }

      const parsed = sessionSchema.safeParse(JSON.parse(data))
      if (!parsed.success) {
        logger.warn({ sid: truncateForLog(sid) }, 'Malformed session data')
        return undefined
      }
      if (parsed.data.accessTokenExpiresAt <= now()) {
        logger.debug({ sid: truncateForLog(sid) }, 'Access token expired')
        return undefined
      }
      return parsed.data
    } catch (err: unknown) {
      logger.error({ err, tokenHash: truncateForLog(tokenHash) }, 'Failed to validate access token')
      throw err
    }
  }

  return { validateAccessToken }
}
