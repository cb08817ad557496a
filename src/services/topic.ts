import { eq } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import type { Topic } from '../db/schema/topics.js'
import type { Post } from '../db/schema/posts.js'
import type { TopicSettings } from '../config/env.js'
import type { Logger } from '../lib/logger.js'
import { notFound, permissionDenied } from '../lib/api-errors.js'
import { generateSlug } from '../lib/slug.js'
import { plainTitleFormatter } from '../lib/title-formatter.js'
import type { TitleFormatter } from '../lib/title-formatter.js'
import { lastPostUrl, relativeTopicUrl } from '../lib/topic-url.js'
import { runInTransaction } from '../lib/transaction.js'
import type { JobScheduler } from '../lib/job-queue.js'
import type { ActingUser, Guardian } from '../auth/guardian.js'
import { createPostCreator } from './post-creator.js'
import { createStatisticsRecalculator } from './topic-statistics.js'
import type { TopicStatistics } from './topic-statistics.js'
import { featureTopicsInCategory, createCategoryTransitionManager } from './category-transition.js'
import type { CategoryChangeResult } from './category-transition.js'
import { createPosterSelector, PosterSummaryCache } from './poster-selector.js'
import type { PosterSummaryEntry } from './poster-selector.js'
import { createPostMigrator } from './post-migrator.js'
import type { MoveDestination, MoveResult } from './post-migrator.js'
import { createTopicStateManager } from './topic-state.js'
import type { NotificationLevel, StarResult } from './topic-state.js'
import { createTopicStatusManager } from './topic-status.js'
import type { StatusUpdateResult, TopicStatusProperty } from './topic-status.js'
import { createInviteCoordinator } from './invite-coordinator.js'
import type { InviteResult } from './invite-coordinator.js'
import { createNotificationService } from './notification.js'
import type { NotificationService } from './notification.js'
import { createTopicCreator } from './topic-creator.js'
import type { CreatedTopic, CreateTopicParams } from './topic-creator.js'
import type { RateLimiterFactory } from './rate-limiter.js'

const DAY_MS = 86_400_000

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TopicServiceDeps {
  db: Executor
  logger: Logger
  guardian: Guardian
  jobs: JobScheduler
  rateLimiter: RateLimiterFactory
  settings: TopicSettings
  titleFormatter?: TitleFormatter
  posterCache?: PosterSummaryCache
  notifications?: NotificationService
}

export interface CreatePostInput {
  raw: string
  replyToPostNumber?: number | null
}

export interface UpdateTopicInput {
  title?: string
  /** Null or blank clears the category. */
  categoryName?: string | null
  /** Null or 0 removes the auto-close. */
  autoCloseDays?: number | null
}

export interface TopicView {
  id: number
  title: string
  fancyTitle: string
  slug: string
  url: string
  lastPostUrl: string
  archetype: Topic['archetype']
  categoryId: number | null
  userId: number
  postsCount: number
  highestPostNumber: number
  replyCount: number
  likeCount: number
  starCount: number
  views: number
  avgTime: number | null
  visible: boolean
  closed: boolean
  archived: boolean
  pinned: boolean
  bumpedAt: string
  autoCloseAt: string | null
  createdAt: string
  posters: PosterSummaryEntry[]
}

export interface TopicService {
  create(params: CreateTopicParams): Promise<CreatedTopic>
  createPost(topicId: number, user: ActingUser, input: CreatePostInput): Promise<Post>
  update(topicId: number, user: ActingUser, input: UpdateTopicInput): Promise<Topic>
  trash(topicId: number, user: ActingUser): Promise<void>
  recover(topicId: number, user: ActingUser): Promise<void>
  updateStatus(
    topicId: number,
    property: TopicStatusProperty,
    value: boolean,
    user: ActingUser
  ): Promise<StatusUpdateResult>
  setAutoClose(topicId: number, user: ActingUser, days: number | null): Promise<Topic>
  movePosts(
    user: ActingUser,
    topicId: number,
    postIds: number[],
    destination: MoveDestination
  ): Promise<MoveResult>
  invite(topicId: number, user: ActingUser, identifier: string): Promise<InviteResult>
  changeCategory(topicId: number, user: ActingUser, name: string | null): Promise<CategoryChangeResult>
  toggleStar(topicId: number, user: ActingUser, starred?: boolean): Promise<StarResult>
  toggleMute(topicId: number, user: ActingUser): Promise<NotificationLevel>
  setNotificationLevel(topicId: number, user: ActingUser, level: NotificationLevel): Promise<void>
  clearPin(topicId: number, user: ActingUser): Promise<void>
  recalculateStatistics(topicId: number): Promise<TopicStatistics>
  /**
   * Close a topic whose auto-close time has passed, acting as `userId`.
   * Returns false when the topic is gone, already closed or rescheduled.
   */
  closeIfDue(topicId: number, userId: number, now?: Date): Promise<boolean>
  posterSummary(topicId: number): Promise<PosterSummaryEntry[]>
  getTopic(topicId: number, viewer?: ActingUser): Promise<TopicView>
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeTopic(
  topic: Topic,
  posters: PosterSummaryEntry[],
  formatter: TitleFormatter
): TopicView {
  return {
    id: topic.id,
    title: topic.title,
    fancyTitle: formatter.render(topic.title),
    slug: topic.slug,
    url: relativeTopicUrl(topic.slug, topic.id),
    lastPostUrl: lastPostUrl(topic.slug, topic.id, topic.postsCount),
    archetype: topic.archetype,
    categoryId: topic.categoryId,
    userId: topic.userId,
    postsCount: topic.postsCount,
    highestPostNumber: topic.highestPostNumber,
    replyCount: topic.replyCount,
    likeCount: topic.likeCount,
    starCount: topic.starCount,
    views: topic.views,
    avgTime: topic.avgTime,
    visible: topic.visible,
    closed: topic.closed,
    archived: topic.archived,
    pinned: topic.pinnedAt !== null,
    bumpedAt: topic.bumpedAt.toISOString(),
    autoCloseAt: topic.autoCloseAt?.toISOString() ?? null,
    createdAt: topic.createdAt.toISOString(),
    posters,
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Entry point for every topic mutation. Wires the components together,
 * applies permission checks and keeps the poster summary cache in step with
 * structural changes.
 */
export function createTopicService(deps: TopicServiceDeps): TopicService {
  const { db, logger, guardian, jobs, rateLimiter, settings } = deps
  const titleFormatter = deps.titleFormatter ?? plainTitleFormatter
  const notifications = deps.notifications ?? createNotificationService(db, logger)

  const postCreator = createPostCreator(db, logger)
  const statistics = createStatisticsRecalculator(db, logger)
  const categories = createCategoryTransitionManager(db, logger, settings.categoryFeaturedTopics)
  const posters = createPosterSelector(db, logger, deps.posterCache ?? new PosterSummaryCache())
  const state = createTopicStateManager({
    db,
    logger,
    rateLimiter,
    maxStarsPerDay: settings.maxStarsPerDay,
  })
  const status = createTopicStatusManager({ db, logger, jobs })
  const invites = createInviteCoordinator({ db, logger, guardian, jobs, notifications })
  const topicCreator = createTopicCreator({
    db,
    logger,
    guardian,
    categories,
    status,
    rateLimiter,
    settings,
  })
  const migrator = createPostMigrator({
    db,
    logger,
    guardian,
    jobs,
    postCreator,
    statistics,
    posters,
    topicCreator,
    settings,
  })

  async function findTopic(topicId: number): Promise<Topic | undefined> {
    const rows = await db.select().from(topics).where(eq(topics.id, topicId)).limit(1)
    return rows[0]
  }

  /** Load a topic the user may see; hidden topics look missing. */
  async function visibleTopic(topicId: number, user: ActingUser | undefined): Promise<Topic> {
    const topic = await findTopic(topicId)
    if (!topic || !(await guardian.canSee(user, topic))) {
      throw notFound(`Topic ${String(topicId)} not found`)
    }
    return topic
  }

  function requireStaff(user: ActingUser): void {
    if (!guardian.isStaff(user)) {
      throw permissionDenied('Staff only')
    }
  }

  async function editableTopic(topicId: number, user: ActingUser): Promise<Topic> {
    const topic = await visibleTopic(topicId, user)
    if (guardian.isStaff(user)) return topic
    if (topic.userId !== user.id || topic.archived) {
      throw permissionDenied('You cannot edit this topic')
    }
    return topic
  }

  async function setDeletedAt(topicId: number, deletedAt: Date | null): Promise<void> {
    await runInTransaction(db, async (tx) => {
      const rows = await tx
        .update(topics)
        .set({ deletedAt, updatedAt: new Date() })
        .where(eq(topics.id, topicId))
        .returning({ categoryId: topics.categoryId })
      const row = rows[0]
      if (!row) {
        throw notFound(`Topic ${String(topicId)} not found`)
      }
      if (row.categoryId !== null) {
        await featureTopicsInCategory(tx, row.categoryId, settings.categoryFeaturedTopics)
      }
    })
    posters.invalidate(topicId)
  }

  return {
    create: (params) => topicCreator.create(params),

    async createPost(topicId, user, input) {
      const topic = await visibleTopic(topicId, user)
      if ((topic.closed || topic.archived) && !guardian.isStaff(user)) {
        throw permissionDenied('This topic does not accept new posts')
      }
      const post = await postCreator.create({
        topicId,
        userId: user.id,
        raw: input.raw,
        replyToPostNumber: input.replyToPostNumber ?? null,
      })
      await posters.featureTopicUsers(topicId)
      posters.invalidate(topicId)
      return post
    },

    async update(topicId, user, input) {
      const topic = await editableTopic(topicId, user)

      if (input.title !== undefined) {
        const title = await topicCreator.checkTitle(input.title, topic.archetype, topicId)
        if (title !== topic.title) {
          await db
            .update(topics)
            .set({ title, slug: generateSlug(title), updatedAt: new Date() })
            .where(eq(topics.id, topicId))
        }
      }

      if (input.categoryName !== undefined) {
        await categories.changeCategory(topicId, input.categoryName)
      }

      if (input.autoCloseDays !== undefined) {
        await status.setAutoClose(topicId, autoCloseFromDays(input.autoCloseDays, user))
      }

      posters.invalidate(topicId)
      const updated = await findTopic(topicId)
      if (!updated) {
        throw notFound(`Topic ${String(topicId)} not found`)
      }
      return updated
    },

    async trash(topicId, user) {
      requireStaff(user)
      await setDeletedAt(topicId, new Date())
      logger.info({ topicId, userId: user.id }, 'Trashed topic')
    },

    async recover(topicId, user) {
      requireStaff(user)
      await setDeletedAt(topicId, null)
      logger.info({ topicId, userId: user.id }, 'Recovered topic')
    },

    async updateStatus(topicId, property, value, user) {
      requireStaff(user)
      const result = await status.updateStatus(topicId, property, value, user)
      posters.invalidate(topicId)
      return result
    },

    async setAutoClose(topicId, user, days) {
      await editableTopic(topicId, user)
      return status.setAutoClose(topicId, autoCloseFromDays(days, user))
    },

    async movePosts(user, topicId, postIds, destination) {
      requireStaff(user)
      return migrator.movePosts(user, topicId, postIds, destination)
    },

    async invite(topicId, user, identifier) {
      await visibleTopic(topicId, user)
      return invites.invite(topicId, user, identifier)
    },

    async changeCategory(topicId, user, name) {
      await editableTopic(topicId, user)
      const result = await categories.changeCategory(topicId, name)
      posters.invalidate(topicId)
      return result
    },

    async toggleStar(topicId, user, starred) {
      await visibleTopic(topicId, user)
      return state.toggleStar(topicId, user.id, starred)
    },

    async toggleMute(topicId, user) {
      await visibleTopic(topicId, user)
      return state.toggleMute(topicId, user.id)
    },

    async setNotificationLevel(topicId, user, level) {
      await visibleTopic(topicId, user)
      await state.setNotificationLevel(topicId, user.id, level)
    },

    async clearPin(topicId, user) {
      await visibleTopic(topicId, user)
      await state.clearPin(topicId, user.id)
    },

    async recalculateStatistics(topicId) {
      const stats = await statistics.recalculate(topicId)
      await posters.featureTopicUsers(topicId)
      posters.invalidate(topicId)
      return stats
    },

    async closeIfDue(topicId, userId, now = new Date()) {
      const topic = await findTopic(topicId)
      if (
        !topic ||
        topic.deletedAt !== null ||
        topic.closed ||
        topic.autoCloseAt === null ||
        topic.autoCloseAt.getTime() > now.getTime()
      ) {
        logger.info({ topicId }, 'Skipping auto-close')
        return false
      }

      const actor = (await guardian.findUser(userId)) ?? systemActor(settings.systemUserId)
      await status.updateStatus(topicId, 'autoclosed', true, actor)
      posters.invalidate(topicId)
      return true
    },

    posterSummary: (topicId) => posters.selectFeatured(topicId),

    async getTopic(topicId, viewer) {
      const topic = await visibleTopic(topicId, viewer)
      const summary = await posters.selectFeatured(topicId)
      return serializeTopic(topic, summary, titleFormatter)
    },
  }
}

function systemActor(id: number): ActingUser {
  return { id, username: 'system', admin: true, moderator: false }
}

function autoCloseFromDays(
  days: number | null,
  user: ActingUser
): { autoCloseAt: Date | null; autoCloseUserId: number | null } {
  if (days === null || days <= 0) {
    return { autoCloseAt: null, autoCloseUserId: null }
  }
  return { autoCloseAt: new Date(Date.now() + days * DAY_MS), autoCloseUserId: user.id }
}
