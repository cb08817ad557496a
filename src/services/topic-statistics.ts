import { and, eq, gt, or, sql } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import type { AnyPgColumn } from 'drizzle-orm/pg-core'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { posts } from '../db/schema/posts.js'
import { topicUsers } from '../db/schema/topic-users.js'
import type { Logger } from '../lib/logger.js'
import { notFound } from '../lib/api-errors.js'
import { runInTransaction } from '../lib/transaction.js'

/** Per-action counters kept on both posts and topics. */
export const ACTION_COUNT_COLUMNS = [
  'likeCount',
  'offTopicCount',
  'bookmarkCount',
  'spamCount',
  'illegalCount',
  'inappropriateCount',
  'notifyModeratorsCount',
  'notifyUserCount',
  'voteCount',
] as const

export type ActionCountColumn = (typeof ACTION_COUNT_COLUMNS)[number]

export interface TopicStatistics {
  highestPostNumber: number
  postsCount: number
}

export interface StatisticsRecalculator {
  recalculate(topicId: number): Promise<TopicStatistics>
  calculateAvgTime(topicId?: number): Promise<void>
}

function livePostsOf(topicId: number): SQL {
  return sql`${posts.topicId} = ${topicId} AND ${posts.deletedAt} IS NULL`
}

// NULL positions stay NULL
function clampTo(column: AnyPgColumn, max: number): SQL {
  return sql`CASE WHEN ${column} > ${max} THEN ${max} ELSE ${column} END`
}

/**
 * Recount a topic from its non-deleted posts and clamp reading positions to
 * the new highest post number. Safe to run any number of times. Call inside
 * a transaction.
 */
export async function recalculateInTransaction(
  tx: Executor,
  topicId: number
): Promise<TopicStatistics> {
  const actionCounts: Partial<Record<ActionCountColumn, SQL>> = {}
  for (const column of ACTION_COUNT_COLUMNS) {
    actionCounts[column] = sql`(SELECT COALESCE(SUM(${posts[column]}), 0) FROM ${posts} WHERE ${livePostsOf(topicId)})`
  }

  const rows = await tx
    .update(topics)
    .set({
      highestPostNumber: sql`(SELECT COALESCE(MAX(${posts.postNumber}), 0) FROM ${posts} WHERE ${livePostsOf(topicId)})`,
      postsCount: sql`(SELECT COUNT(*) FROM ${posts} WHERE ${livePostsOf(topicId)})`,
      ...actionCounts,
      updatedAt: new Date(),
    })
    .where(eq(topics.id, topicId))
    .returning({ highestPostNumber: topics.highestPostNumber, postsCount: topics.postsCount })

  const stats = rows[0]
  if (!stats) {
    throw notFound(`Topic ${String(topicId)} not found`)
  }

  const highest = stats.highestPostNumber
  await tx
    .update(topicUsers)
    .set({
      lastReadPostNumber: clampTo(topicUsers.lastReadPostNumber, highest),
      seenPostCount: clampTo(topicUsers.seenPostCount, highest),
    })
    .where(
      and(
        eq(topicUsers.topicId, topicId),
        or(gt(topicUsers.lastReadPostNumber, highest), gt(topicUsers.seenPostCount, highest))
      )
    )

  return stats
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createStatisticsRecalculator(db: Executor, logger: Logger): StatisticsRecalculator {
  return {
    async recalculate(topicId: number): Promise<TopicStatistics> {
      const stats = await runInTransaction(db, (tx) => recalculateInTransaction(tx, topicId))
      logger.debug({ topicId, ...stats }, 'Recalculated topic statistics')
      return stats
    },

    /**
     * Set avg_time to the rounded geometric mean of the positive per-post
     * reading times. Topics without timing data keep their value.
     */
    async calculateAvgTime(topicId?: number): Promise<void> {
      const scope = topicId === undefined ? sql`` : sql` AND ${posts.topicId} = ${topicId}`
      await db.execute(sql`
        UPDATE ${topics}
        SET avg_time = timing.gmean
        FROM (
          SELECT ${posts.topicId} AS topic_id, ROUND(EXP(AVG(LN(${posts.avgTime})))) AS gmean
          FROM ${posts}
          WHERE ${posts.avgTime} > 0 AND ${posts.deletedAt} IS NULL${scope}
          GROUP BY ${posts.topicId}
        ) AS timing
        WHERE timing.topic_id = ${topics.id}
      `)
      logger.info({ topicId: topicId ?? 'all' }, 'Calculated average reading time')
    },
  }
}
