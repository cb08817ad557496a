import { eq } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import type { Topic } from '../db/schema/topics.js'
import type { Post } from '../db/schema/posts.js'
import type { Logger } from '../lib/logger.js'
import { notFound } from '../lib/api-errors.js'
import { translate } from '../lib/messages.js'
import type { MessageKey, MessageParams } from '../lib/messages.js'
import { runInTransaction } from '../lib/transaction.js'
import { JobQueues } from '../lib/job-queue.js'
import type { JobScheduler } from '../lib/job-queue.js'
import type { ActingUser } from '../auth/guardian.js'
import { insertModeratorPost } from './post-creator.js'

const DAY_MS = 86_400_000

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const TOPIC_STATUS_PROPERTIES = ['closed', 'autoclosed', 'archived', 'visible', 'pinned'] as const

export type TopicStatusProperty = (typeof TOPIC_STATUS_PROPERTIES)[number]

export interface AutoCloseState {
  autoCloseAt: Date | null
  autoCloseUserId: number | null
}

export interface AutoCloseChange {
  cancel: boolean
  schedule: { runAt: Date; userId: number } | null
}

export interface StatusUpdateResult {
  topic: Topic
  post: Post
}

export interface TopicStatusManager {
  updateStatus(
    topicId: number,
    property: TopicStatusProperty,
    value: boolean,
    actingUser: ActingUser
  ): Promise<StatusUpdateResult>
  setAutoClose(topicId: number, next: AutoCloseState): Promise<Topic>
  /** Cancel or schedule the close job after a committed auto-close change. */
  applyAutoCloseChange(
    topicId: number,
    before: AutoCloseState,
    after: AutoCloseState,
    creatorId: number
  ): Promise<void>
}

export interface TopicStatusDeps {
  db: Executor
  logger: Logger
  jobs: JobScheduler
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export function statusMessageKey(property: TopicStatusProperty, value: boolean): MessageKey {
  return `topic_statuses.${property}_${value ? 'enabled' : 'disabled'}`
}

/** Only reopening a topic counts as new activity. */
export function shouldBump(property: TopicStatusProperty, value: boolean): boolean {
  return (property === 'closed' || property === 'autoclosed') && !value
}

/** Whole days between creation and the auto-close instant (or now). */
export function autoClosedDays(createdAt: Date, autoCloseAt: Date | null, now: Date): number {
  const end = autoCloseAt ?? now
  return Math.round((end.getTime() - createdAt.getTime()) / DAY_MS)
}

type StatusColumns = Partial<Pick<Topic, 'closed' | 'archived' | 'visible' | 'pinnedAt'>>

export function statusColumnUpdate(
  property: TopicStatusProperty,
  value: boolean,
  now: Date
): StatusColumns {
  switch (property) {
    case 'pinned':
      return { pinnedAt: value ? now : null }
    case 'closed':
    case 'autoclosed':
      return { closed: value }
    case 'archived':
      return { archived: value }
    case 'visible':
      return { visible: value }
  }
}

function sameInstant(a: Date | null, b: Date | null): boolean {
  return (a?.getTime() ?? null) === (b?.getTime() ?? null)
}

/**
 * Decide what happens to the scheduled close job when the auto-close fields
 * move from `before` to `after`.
 */
export function planAutoCloseChange(
  before: AutoCloseState,
  after: AutoCloseState,
  creatorId: number
): AutoCloseChange {
  const timeChanged = !sameInstant(before.autoCloseAt, after.autoCloseAt)
  const userChanged = before.autoCloseUserId !== after.autoCloseUserId

  const cancel =
    (timeChanged && before.autoCloseAt !== null) || (userChanged && after.autoCloseAt !== null)

  const schedule =
    after.autoCloseAt !== null && (timeChanged || userChanged)
      ? { runAt: after.autoCloseAt, userId: after.autoCloseUserId ?? creatorId }
      : null

  return { cancel, schedule }
}

export function closeJobKey(topicId: number): string {
  return String(topicId)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTopicStatusManager(deps: TopicStatusDeps): TopicStatusManager {
  const { db, logger, jobs } = deps

  async function applyAutoCloseChange(
    topicId: number,
    before: AutoCloseState,
    after: AutoCloseState,
    creatorId: number
  ): Promise<void> {
    const change = planAutoCloseChange(before, after, creatorId)
    const key = closeJobKey(topicId)
    try {
      if (change.cancel) {
        await jobs.cancel(JobQueues.CLOSE_TOPIC, key)
      }
      if (change.schedule) {
        await jobs.schedule(
          JobQueues.CLOSE_TOPIC,
          change.schedule.runAt,
          { topicId, userId: change.schedule.userId },
          key
        )
      }
    } catch (err: unknown) {
      logger.error({ err, topicId }, 'Failed to update scheduled auto-close')
    }
  }

  return {
    async updateStatus(topicId, property, value, actingUser) {
      const result = await runInTransaction(db, async (tx) => {
        const now = new Date()
        const rows = await tx
          .update(topics)
          .set({ ...statusColumnUpdate(property, value, now), updatedAt: now })
          .where(eq(topics.id, topicId))
          .returning()
        const topic = rows[0]
        if (!topic) {
          throw notFound(`Topic ${String(topicId)} not found`)
        }

        const params: MessageParams =
          property === 'autoclosed'
            ? { count: autoClosedDays(topic.createdAt, topic.autoCloseAt, now) }
            : {}
        const post = await insertModeratorPost(tx, {
          topicId,
          userId: actingUser.id,
          raw: translate(statusMessageKey(property, value), params),
          bump: shouldBump(property, value),
        })

        return { topic, post }
      })

      logger.info({ topicId, property, value, userId: actingUser.id }, 'Updated topic status')
      return result
    },

    async setAutoClose(topicId, next) {
      const { before, topic } = await runInTransaction(db, async (tx) => {
        const current = await tx
          .select({
            autoCloseAt: topics.autoCloseAt,
            autoCloseUserId: topics.autoCloseUserId,
          })
          .from(topics)
          .where(eq(topics.id, topicId))
          .for('update')
        const previous = current[0]
        if (!previous) {
          throw notFound(`Topic ${String(topicId)} not found`)
        }

        const rows = await tx
          .update(topics)
          .set({
            autoCloseAt: next.autoCloseAt,
            autoCloseUserId: next.autoCloseAt === null ? null : next.autoCloseUserId,
            updatedAt: new Date(),
          })
          .where(eq(topics.id, topicId))
          .returning()
        const updated = rows[0]
        if (!updated) {
          throw notFound(`Topic ${String(topicId)} not found`)
        }
        return { before: previous, topic: updated }
      })

      await applyAutoCloseChange(
        topicId,
        before,
        { autoCloseAt: topic.autoCloseAt, autoCloseUserId: topic.autoCloseUserId },
        topic.userId
      )
      return topic
    },

    applyAutoCloseChange,
  }
}
