import { and, count, eq, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { topicUsers } from '../db/schema/topic-users.js'
import type { Logger } from '../lib/logger.js'
import { notFound } from '../lib/api-errors.js'
import { runInTransaction } from '../lib/transaction.js'
import { dailyLimit } from './rate-limiter.js'
import type { RateLimiterFactory } from './rate-limiter.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NOTIFICATION_LEVELS = {
  muted: 0,
  regular: 1,
  tracking: 2,
  watching: 3,
} as const

export type NotificationLevelName = keyof typeof NOTIFICATION_LEVELS
export type NotificationLevel = (typeof NOTIFICATION_LEVELS)[NotificationLevelName]

/** Why a user ended up at their notification level. */
export const NOTIFICATION_REASONS = {
  createdTopic: 1,
  userChanged: 2,
  userInteracted: 3,
} as const

export type NotificationReason = (typeof NOTIFICATION_REASONS)[keyof typeof NOTIFICATION_REASONS]

const STAR_ACTION = 'starred'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TopicUserPatch = Partial<
  Omit<typeof topicUsers.$inferInsert, 'topicId' | 'userId'>
>

export interface StarResult {
  starred: boolean
  starCount: number
}

export interface TopicStateManager {
  setNotificationLevel(
    topicId: number,
    userId: number,
    level: NotificationLevel,
    reason?: NotificationReason
  ): Promise<void>
  watch(topicId: number, userId: number): Promise<void>
  track(topicId: number, userId: number): Promise<void>
  regular(topicId: number, userId: number): Promise<void>
  mute(topicId: number, userId: number): Promise<void>
  /** Omit `starred` to flip the current state. */
  toggleStar(topicId: number, userId: number, starred?: boolean): Promise<StarResult>
  /** Muted becomes regular, anything else becomes muted. Returns the new level. */
  toggleMute(topicId: number, userId: number): Promise<NotificationLevel>
  clearPin(topicId: number, userId: number): Promise<void>
  isMuted(topicId: number, userId: number): Promise<boolean>
}

export interface TopicStateDeps {
  db: Executor
  logger: Logger
  rateLimiter: RateLimiterFactory
  maxStarsPerDay: number
}

// ---------------------------------------------------------------------------
// Transaction-scoped helpers
// ---------------------------------------------------------------------------

/** Insert or update the (topic, user) row with the given fields. */
export async function changeTopicUser(
  executor: Executor,
  topicId: number,
  userId: number,
  patch: TopicUserPatch
): Promise<void> {
  const insert = executor.insert(topicUsers).values({ ...patch, topicId, userId })
  if (Object.keys(patch).length === 0) {
    await insert.onConflictDoNothing()
    return
  }
  await insert.onConflictDoUpdate({
    target: [topicUsers.topicId, topicUsers.userId],
    set: patch,
  })
}

async function readTopicUser(
  executor: Executor,
  topicId: number,
  userId: number
): Promise<{ notificationLevel: number; starred: boolean } | undefined> {
  const rows = await executor
    .select({ notificationLevel: topicUsers.notificationLevel, starred: topicUsers.starred })
    .from(topicUsers)
    .where(and(eq(topicUsers.topicId, topicId), eq(topicUsers.userId, userId)))
    .limit(1)
  return rows[0]
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTopicStateManager(deps: TopicStateDeps): TopicStateManager {
  const { db, logger, rateLimiter, maxStarsPerDay } = deps

  async function setLevel(
    topicId: number,
    userId: number,
    level: NotificationLevel,
    reason: NotificationReason = NOTIFICATION_REASONS.userChanged
  ): Promise<void> {
    await changeTopicUser(db, topicId, userId, {
      notificationLevel: level,
      notificationsReasonId: reason,
    })
  }

  return {
    setNotificationLevel: setLevel,

    watch: (topicId, userId) => setLevel(topicId, userId, NOTIFICATION_LEVELS.watching),
    track: (topicId, userId) => setLevel(topicId, userId, NOTIFICATION_LEVELS.tracking),
    regular: (topicId, userId) => setLevel(topicId, userId, NOTIFICATION_LEVELS.regular),
    mute: (topicId, userId) => setLevel(topicId, userId, NOTIFICATION_LEVELS.muted),

    async toggleStar(topicId, userId, starred) {
      const limiter = dailyLimit(rateLimiter, userId, STAR_ACTION, maxStarsPerDay)

      const result = await runInTransaction(db, async (tx) => {
        const previous = (await readTopicUser(tx, topicId, userId))?.starred ?? false
        const next = starred ?? !previous
        const now = new Date()

        await changeTopicUser(
          tx,
          topicId,
          userId,
          next
            ? { starred: true, starredAt: now, unstarredAt: null }
            : { starred: false, unstarredAt: now }
        )

        const starredRows = sql`(SELECT ${count()} FROM ${topicUsers} WHERE ${topicUsers.topicId} = ${topicId} AND ${topicUsers.starred} = true)`
        const rows = await tx
          .update(topics)
          .set({ starCount: starredRows })
          .where(eq(topics.id, topicId))
          .returning({ starCount: topics.starCount })
        const row = rows[0]
        if (!row) {
          throw notFound(`Topic ${String(topicId)} not found`)
        }

        // A refused credit throws and rolls the star back with it
        if (next !== previous) {
          if (next) {
            await limiter.performed()
          } else {
            await limiter.rollback()
          }
        }

        return { starred: next, starCount: row.starCount }
      })

      logger.debug({ topicId, userId, ...result }, 'Toggled star')
      return result
    },

    async toggleMute(topicId, userId) {
      const current = await readTopicUser(db, topicId, userId)
      const next =
        current?.notificationLevel === NOTIFICATION_LEVELS.muted
          ? NOTIFICATION_LEVELS.regular
          : NOTIFICATION_LEVELS.muted
      await setLevel(topicId, userId, next)
      return next
    },

    async clearPin(topicId, userId) {
      await changeTopicUser(db, topicId, userId, { clearedPinnedAt: new Date() })
    },

    async isMuted(topicId, userId) {
      const current = await readTopicUser(db, topicId, userId)
      return current?.notificationLevel === NOTIFICATION_LEVELS.muted
    },
  }
}
