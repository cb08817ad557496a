import type { FastifyRequest } from 'fastify'
import type { Logger } from '../lib/logger.js'
import { permissionDenied, unauthenticated, upstreamUnavailable } from '../lib/api-errors.js'
import type { ActingUser, Guardian } from './guardian.js'
import type { Session, SessionService } from './session.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The acting user of a request, tied to the session that authenticated it. */
export interface RequestUser extends ActingUser {
  sid: string
}

/** Route preHandlers. Failures are thrown as ApiErrors for the app error handler. */
export interface AuthMiddleware {
  requireAuth: (request: FastifyRequest) => Promise<void>
  /** requireAuth, then a fresh admin/moderator check against the user record. */
  requireStaff: (request: FastifyRequest) => Promise<void>
  optionalAuth: (request: FastifyRequest) => Promise<void>
}

declare module 'fastify' {
  interface FastifyRequest {
    user?: RequestUser
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BEARER_PREFIX = 'Bearer '

function bearerToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization
  if (!header?.startsWith(BEARER_PREFIX)) return undefined
  const token = header.slice(BEARER_PREFIX.length).trim()
  return token === '' ? undefined : token
}

function userFromSession(session: Session): RequestUser {
  return {
    id: session.userId,
    username: session.username,
    admin: session.admin,
    moderator: session.moderator,
    sid: session.sid,
  }
}

/**
 * The user a `requireAuth` or `requireStaff` preHandler attached. Handlers
 * behind either hook call this instead of re-checking `request.user`.
 */
export function authenticatedUser(request: FastifyRequest): RequestUser {
  if (!request.user) {
    throw unauthenticated('Authentication required')
  }
  return request.user
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createAuthMiddleware(
  sessionService: SessionService,
  guardian: Pick<Guardian, 'findUser' | 'isStaff'>,
  logger: Logger
): AuthMiddleware {
  async function requireAuth(request: FastifyRequest): Promise<void> {
    const token = bearerToken(request)
    if (token === undefined) {
      throw unauthenticated('Authentication required')
    }

    let session: Session | undefined
    try {
      session = await sessionService.validateAccessToken(token)
    } catch (err: unknown) {
      logger.error({ err }, 'Session lookup failed')
      throw upstreamUnavailable('Session store unavailable')
    }
    if (!session) {
      throw unauthenticated('Invalid or expired token')
    }

    request.user = userFromSession(session)
  }

  async function requireStaff(request: FastifyRequest): Promise<void> {
    await requireAuth(request)
    const user = authenticatedUser(request)

    // Session flags can be stale after a demotion
    const current = await guardian.findUser(user.id)
    if (!current || !guardian.isStaff(current)) {
      logger.warn(
        { userId: user.id, method: request.method, url: request.url },
        'Staff route refused'
      )
      throw permissionDenied('Staff only')
    }

    request.user = { ...user, admin: current.admin, moderator: current.moderator }
  }

  async function optionalAuth(request: FastifyRequest): Promise<void> {
    const token = bearerToken(request)
    if (token === undefined) return

    try {
      const session = await sessionService.validateAccessToken(token)
      if (session) {
        request.user = userFromSession(session)
      }
    } catch (err: unknown) {
      logger.warn({ err }, 'Session lookup failed, continuing as anonymous')
    }
  }

  return { requireAuth, requireStaff, optionalAuth }
}
