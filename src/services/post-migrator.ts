import { and, asc, eq, inArray, isNull, max, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import type { Topic } from '../db/schema/topics.js'
import { posts } from '../db/schema/posts.js'
import type { TopicSettings } from '../config/env.js'
import type { Logger } from '../lib/logger.js'
import {
  concurrencyConflict,
  invalidArgument,
  notFound,
  permissionDenied,
} from '../lib/api-errors.js'
import { translate } from '../lib/messages.js'
import { runInTransaction } from '../lib/transaction.js'
import { topicUrl } from '../lib/topic-url.js'
import { JobQueues } from '../lib/job-queue.js'
import type { JobScheduler } from '../lib/job-queue.js'
import type { ActingUser, Guardian } from '../auth/guardian.js'
import type { PostCreator } from './post-creator.js'
import type { StatisticsRecalculator } from './topic-statistics.js'
import type { PosterSelector } from './poster-selector.js'
import type { TopicCreator } from './topic-creator.js'
import { lockTopicRows } from './sequence-allocator.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MoveDestination = { title: string } | { topicId: number }

export interface MigrationCandidate {
  id: number
  postNumber: number
  userId: number
  raw: string
}

export interface MigrationPlan {
  /** The opening post is copied, never moved. */
  copies: { source: MigrationCandidate; postNumber: number }[]
  moves: { postId: number; postNumber: number }[]
  /** Source number of the first post that actually leaves the source topic. */
  firstMovedPostNumber: number | null
}

export interface MoveResult {
  destination: Topic
  firstMovedPostNumber: number | null
  movedPostIds: number[]
}

export interface PostMigrator {
  movePosts(
    movedBy: ActingUser,
    sourceTopicId: number,
    postIds: number[],
    destination: MoveDestination
  ): Promise<MoveResult>
}

export interface PostMigratorDeps {
  db: Executor
  logger: Logger
  guardian: Guardian
  jobs: JobScheduler
  postCreator: PostCreator
  statistics: StatisticsRecalculator
  posters: PosterSelector
  topicCreator: TopicCreator
  settings: Pick<TopicSettings, 'baseUrl'>
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Number the candidates after the destination's current maximum, in the
 * order given.
 */
export function planPostMigration(
  candidates: MigrationCandidate[],
  destinationMax: number
): MigrationPlan {
  const plan: MigrationPlan = { copies: [], moves: [], firstMovedPostNumber: null }

  candidates.forEach((post, index) => {
    const postNumber = destinationMax + index + 1
    if (post.postNumber === 1) {
      plan.copies.push({ source: post, postNumber })
      return
    }
    plan.firstMovedPostNumber ??= post.postNumber
    plan.moves.push({ postId: post.id, postNumber })
  })

  return plan
}

/** Requested ids that did not come back from the source topic. */
export function findForeignPostIds(requested: number[], found: number[]): number[] {
  const present = new Set(found)
  return requested.filter((id) => !present.has(id))
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPostMigrator(deps: PostMigratorDeps): PostMigrator {
  const { db, logger, guardian, jobs, postCreator, statistics, posters, topicCreator, settings } =
    deps

  async function loadTopic(topicId: number): Promise<Topic | undefined> {
    const rows = await db.select().from(topics).where(eq(topics.id, topicId)).limit(1)
    return rows[0]
  }

  async function refreshTopic(topicId: number): Promise<void> {
    await statistics.recalculate(topicId)
    await posters.featureTopicUsers(topicId)
    posters.invalidate(topicId)
  }

  /** The move has committed; a failed follow-up is logged and the rest still run. */
  async function afterCommit(
    message: string,
    context: Record<string, number>,
    step: () => Promise<unknown>
  ): Promise<void> {
    try {
      await step()
    } catch (err: unknown) {
      logger.error({ err, ...context }, message)
    }
  }

  return {
    async movePosts(movedBy, sourceTopicId, postIds, destination) {
      const requested = [...new Set(postIds)]
      if (requested.length === 0) {
        throw invalidArgument('No posts selected', { postIds: [] })
      }

      const source = await loadTopic(sourceTopicId)
      if (!source) {
        throw notFound(`Topic ${String(sourceTopicId)} not found`)
      }

      let existingDestination: Topic | undefined
      let newTitle = ''
      if ('topicId' in destination) {
        if (destination.topicId === sourceTopicId) {
          throw invalidArgument('Posts cannot be moved into their own topic')
        }
        existingDestination = await loadTopic(destination.topicId)
        if (!existingDestination) {
          throw notFound(`Topic ${String(destination.topicId)} not found`)
        }
        if (!(await guardian.canSee(movedBy, existingDestination))) {
          throw permissionDenied('You cannot move posts into that topic')
        }
      } else {
        newTitle = await topicCreator.checkTitle(destination.title, source.archetype)
      }

      const result = await runInTransaction(db, async (tx) => {
        const locked = await lockTopicRows(
          tx,
          existingDestination ? [sourceTopicId, existingDestination.id] : [sourceTopicId]
        )
        if (!locked.includes(sourceTopicId)) {
          throw notFound(`Topic ${String(sourceTopicId)} not found`)
        }

        const candidates = await tx
          .select({
            id: posts.id,
            postNumber: posts.postNumber,
            userId: posts.userId,
            raw: posts.raw,
          })
          .from(posts)
          .where(
            and(
              inArray(posts.id, requested),
              eq(posts.topicId, sourceTopicId),
              isNull(posts.deletedAt)
            )
          )
          .orderBy(asc(posts.createdAt), asc(posts.id))

        const foreign = findForeignPostIds(
          requested,
          candidates.map((post) => post.id)
        )
        if (foreign.length > 0) {
          throw invalidArgument('Some posts are not in the source topic', { postIds: foreign })
        }

        let target: Topic
        if (existingDestination) {
          if (!locked.includes(existingDestination.id)) {
            throw notFound(`Topic ${String(existingDestination.id)} not found`)
          }
          target = existingDestination
        } else {
          target = await topicCreator.insertTopic(tx, {
            user: movedBy,
            title: newTitle,
            archetype: source.archetype,
            categoryId: source.categoryId,
            autoCloseAt: null,
            autoCloseUserId: null,
          })
        }

        // Deleted posts still hold their numbers
        const maxRows = await tx
          .select({ value: max(posts.postNumber) })
          .from(posts)
          .where(eq(posts.topicId, target.id))
        const plan = planPostMigration(candidates, maxRows[0]?.value ?? 0)

        for (const copy of plan.copies) {
          await tx.insert(posts).values({
            topicId: target.id,
            userId: copy.source.userId,
            raw: copy.source.raw,
            postNumber: copy.postNumber,
            sortOrder: copy.postNumber,
          })
        }

        const now = new Date()
        const conflicts: number[] = []
        for (const move of plan.moves) {
          const updated = await tx
            .update(posts)
            .set({
              topicId: target.id,
              postNumber: move.postNumber,
              sortOrder: move.postNumber,
              updatedAt: now,
            })
            .where(and(eq(posts.id, move.postId), eq(posts.topicId, sourceTopicId)))
            .returning({ id: posts.id })
          if (updated.length === 0) {
            conflicts.push(move.postId)
          }
        }
        if (conflicts.length > 0) {
          throw concurrencyConflict('Some posts changed while being moved', { postIds: conflicts })
        }

        // Allocations waiting on the destination lock must see the new numbers
        const lastAssigned = (maxRows[0]?.value ?? 0) + candidates.length
        await tx
          .update(topics)
          .set({
            highestPostNumber: sql`GREATEST(${topics.highestPostNumber}, ${lastAssigned})`,
          })
          .where(eq(topics.id, target.id))

        return {
          destination: target,
          firstMovedPostNumber: plan.firstMovedPostNumber,
          movedPostIds: plan.moves.map((move) => move.postId),
        }
      })

      const target = result.destination
      const topicLink = `[${target.title}](${topicUrl(settings.baseUrl, target.slug, target.id)})`
      const messageKey = existingDestination
        ? 'move_posts.existing_topic_moderator_post'
        : 'move_posts.moderator_post'

      await afterCommit('Failed to create move moderator post', { sourceTopicId }, () =>
        postCreator.createModeratorPost({
          topicId: sourceTopicId,
          userId: movedBy.id,
          raw: translate(messageKey, { count: requested.length, topicLink }),
          ...(result.firstMovedPostNumber === null
            ? {}
            : { postNumber: result.firstMovedPostNumber }),
        })
      )

      for (const topicId of [target.id, sourceTopicId]) {
        await afterCommit('Failed to refresh topic after move', { sourceTopicId, topicId }, () =>
          refreshTopic(topicId)
        )
      }

      await afterCommit('Failed to queue moved post notifications', { sourceTopicId }, () =>
        jobs.enqueue(JobQueues.NOTIFY_MOVED_POSTS, {
          postIds: requested,
          movedById: movedBy.id,
        })
      )

      logger.info(
        {
          sourceTopicId,
          destinationTopicId: target.id,
          moved: result.movedPostIds.length,
          userId: movedBy.id,
        },
        'Moved posts'
      )
      return result
    },
  }
}
