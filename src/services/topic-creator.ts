import { and, eq, isNull, ne, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import type { Topic, TopicArchetype } from '../db/schema/topics.js'
import { categories } from '../db/schema/categories.js'
import { topicAllowedUsers } from '../db/schema/topic-allowed-users.js'
import type { Post } from '../db/schema/posts.js'
import type { TopicSettings } from '../config/env.js'
import type { Logger } from '../lib/logger.js'
import { invalidArgument, notFound, validationFailure } from '../lib/api-errors.js'
import { sanitizeTitle } from '../lib/sanitize.js'
import { generateSlug } from '../lib/slug.js'
import { runInTransaction } from '../lib/transaction.js'
import type { ActingUser, Guardian } from '../auth/guardian.js'
import type { CategoryTransitionManager } from './category-transition.js'
import type { TopicStatusManager } from './topic-status.js'
import { changeTopicUser, NOTIFICATION_LEVELS, NOTIFICATION_REASONS } from './topic-state.js'
import { insertPost } from './post-creator.js'
import { dailyLimit } from './rate-limiter.js'
import type { RateLimiter, RateLimiterFactory } from './rate-limiter.js'

const DAY_MS = 86_400_000

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateTopicParams {
  userId: number
  title: string
  archetype?: TopicArchetype
  categoryId?: number | null
  /** Overrides the category default; 0 or null disables auto-close. */
  autoCloseDays?: number | null
  /** Body of the first post, created in the same transaction. */
  raw?: string
}

export interface InsertTopicParams {
  user: ActingUser
  title: string
  archetype: TopicArchetype
  categoryId: number | null
  autoCloseAt: Date | null
  autoCloseUserId: number | null
}

export interface CreatedTopic {
  topic: Topic
  firstPost: Post | null
}

export interface TopicCreator {
  create(params: CreateTopicParams): Promise<CreatedTopic>
  /** Insert a topic inside an open transaction (creation path side effects included). */
  insertTopic(tx: Executor, params: InsertTopicParams): Promise<Topic>
  /** Clean the title and enforce length and uniqueness rules. */
  checkTitle(title: string, archetype: TopicArchetype, exceptTopicId?: number): Promise<string>
}

export interface TopicCreatorDeps {
  db: Executor
  logger: Logger
  guardian: Guardian
  categories: CategoryTransitionManager
  status: TopicStatusManager
  rateLimiter: RateLimiterFactory
  settings: TopicSettings
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/** Sanitize a title and enforce the configured length limits. */
export function cleanTitle(
  title: string,
  settings: Pick<TopicSettings, 'titleMinLength' | 'titleMaxLength'>
): string {
  const cleaned = sanitizeTitle(title)
  if (cleaned.length < settings.titleMinLength) {
    throw validationFailure(
      `Title must be at least ${String(settings.titleMinLength)} characters`,
      { reason: 'title_too_short' }
    )
  }
  if (cleaned.length > settings.titleMaxLength) {
    throw validationFailure(
      `Title must be at most ${String(settings.titleMaxLength)} characters`,
      { reason: 'title_too_long' }
    )
  }
  return cleaned
}

/**
 * Where the auto-close comes from and who it acts as. Explicit days act as
 * the creator; a category default acts as the creator only when staff.
 */
export function resolveAutoClose(
  now: Date,
  explicitDays: number | null | undefined,
  categoryDays: number | null,
  creator: { id: number; staff: boolean },
  systemUserId: number
): { autoCloseAt: Date | null; autoCloseUserId: number | null } {
  if (explicitDays !== undefined) {
    if (explicitDays === null || explicitDays <= 0) {
      return { autoCloseAt: null, autoCloseUserId: null }
    }
    return { autoCloseAt: new Date(now.getTime() + explicitDays * DAY_MS), autoCloseUserId: null }
  }
  if (categoryDays !== null && categoryDays > 0) {
    return {
      autoCloseAt: new Date(now.getTime() + categoryDays * DAY_MS),
      autoCloseUserId: creator.staff ? creator.id : systemUserId,
    }
  }
  return { autoCloseAt: null, autoCloseUserId: null }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTopicCreator(deps: TopicCreatorDeps): TopicCreator {
  const { db, logger, guardian, categories: categoryManager, status, rateLimiter, settings } = deps

  async function checkTitle(
    title: string,
    archetype: TopicArchetype,
    exceptTopicId?: number
  ): Promise<string> {
    const cleaned = cleanTitle(title, settings)
    if (settings.allowDuplicateTitles || archetype === 'private_message') {
      return cleaned
    }

    const duplicates = await db
      .select({ id: topics.id })
      .from(topics)
      .where(
        and(
          sql`lower(${topics.title}) = ${cleaned.toLowerCase()}`,
          ne(topics.archetype, 'private_message'),
          isNull(topics.deletedAt),
          exceptTopicId === undefined ? undefined : ne(topics.id, exceptTopicId)
        )
      )
      .limit(1)
    if (duplicates.length > 0) {
      throw validationFailure('A topic with this title already exists', {
        reason: 'duplicate_title',
      })
    }
    return cleaned
  }

  async function insertTopic(tx: Executor, params: InsertTopicParams): Promise<Topic> {
    const now = new Date()
    const rows = await tx
      .insert(topics)
      .values({
        title: params.title,
        slug: generateSlug(params.title),
        archetype: params.archetype,
        categoryId: params.categoryId,
        userId: params.user.id,
        lastPostUserId: params.user.id,
        bumpedAt: now,
        autoCloseAt: params.autoCloseAt,
        autoCloseUserId: params.autoCloseUserId,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
    const topic = rows[0]
    if (!topic) {
      throw new Error('Topic insert returned no row')
    }

    await categoryManager.changedToCategory(tx, topic.id, params.categoryId)

    await changeTopicUser(tx, topic.id, params.user.id, {
      notificationLevel: NOTIFICATION_LEVELS.watching,
      notificationsReasonId: NOTIFICATION_REASONS.createdTopic,
    })

    if (params.archetype === 'private_message') {
      await tx
        .insert(topicAllowedUsers)
        .values({ topicId: topic.id, userId: params.user.id })
        .onConflictDoNothing()
    }

    return topic
  }

  async function categoryAutoCloseDays(categoryId: number | null): Promise<number | null> {
    if (categoryId === null) return null
    const rows = await db
      .select({ autoCloseDays: categories.autoCloseDays })
      .from(categories)
      .where(eq(categories.id, categoryId))
      .limit(1)
    const category = rows[0]
    if (!category) {
      throw invalidArgument(`Unknown category: ${String(categoryId)}`)
    }
    return category.autoCloseDays
  }

  return {
    async create(params: CreateTopicParams): Promise<CreatedTopic> {
      const user = await guardian.findUser(params.userId)
      if (!user) {
        throw notFound(`User ${String(params.userId)} not found`)
      }

      const archetype = params.archetype ?? 'regular'
      const categoryId = archetype === 'private_message' ? null : (params.categoryId ?? null)
      const title = await checkTitle(params.title, archetype)
      const categoryDays = await categoryAutoCloseDays(categoryId)
      const autoClose = resolveAutoClose(
        new Date(),
        params.autoCloseDays,
        categoryDays,
        { id: user.id, staff: guardian.isStaff(user) },
        settings.systemUserId
      )

      const limiters: RateLimiter[] = [
        dailyLimit(rateLimiter, user.id, 'create_topic', settings.maxTopicsPerDay),
      ]
      if (archetype === 'private_message') {
        limiters.push(
          dailyLimit(rateLimiter, user.id, 'create_private_message', settings.maxPrivateMessagesPerDay)
        )
      }
      const consumed: RateLimiter[] = []
      let created: CreatedTopic
      try {
        for (const limiter of limiters) {
          await limiter.performed()
          consumed.push(limiter)
        }

        created = await runInTransaction(db, async (tx) => {
          const topic = await insertTopic(tx, {
            user,
            title,
            archetype,
            categoryId,
            ...autoClose,
          })
          const firstPost =
            params.raw === undefined
              ? null
              : await insertPost(tx, { topicId: topic.id, userId: user.id, raw: params.raw })
          return { topic, firstPost }
        })
      } catch (err: unknown) {
        for (const limiter of consumed) {
          await limiter.rollback()
        }
        throw err
      }

      await status.applyAutoCloseChange(
        created.topic.id,
        { autoCloseAt: null, autoCloseUserId: null },
        autoClose,
        user.id
      )

      logger.info(
        { topicId: created.topic.id, userId: user.id, archetype, categoryId },
        'Created topic'
      )
      return created
    },

    insertTopic,
    checkTitle,
  }
}
