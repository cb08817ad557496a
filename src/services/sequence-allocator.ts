import { asc, eq, inArray, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { posts } from '../db/schema/posts.js'
import { notFound } from '../lib/api-errors.js'

/**
 * Hand out the next post number of a topic. Must run inside the transaction
 * that inserts the post, so a number is never consumed without its post.
 *
 * The UPDATE takes the topic row lock, which serializes concurrent
 * allocations on one topic. The new value is one more than the greater of
 * the counter and the highest number stored in the topic (deleted posts
 * included), so numbers are never reused even after a recount lowered the
 * counter.
 */
export async function allocatePostNumber(
  tx: Executor,
  topicId: number,
  isReply: boolean
): Promise<number> {
  const storedMax = sql`(SELECT COALESCE(MAX(${posts.postNumber}), 0) FROM ${posts} WHERE ${posts.topicId} = ${topicId})`

  const rows = await tx
    .update(topics)
    .set({
      highestPostNumber: sql`GREATEST(${topics.highestPostNumber}, ${storedMax}) + 1`,
      ...(isReply ? { replyCount: sql`${topics.replyCount} + 1` } : {}),
    })
    .where(eq(topics.id, topicId))
    .returning({ highestPostNumber: topics.highestPostNumber })

  const row = rows[0]
  if (!row) {
    throw notFound(`Topic ${String(topicId)} not found`)
  }
  return row.highestPostNumber
}

/**
 * Lock topic rows for the rest of the transaction, always in ascending id
 * order so two writers touching the same pair of topics cannot deadlock.
 * Returns the ids that exist.
 */
export async function lockTopicRows(tx: Executor, topicIds: number[]): Promise<number[]> {
  const ids = [...new Set(topicIds)].sort((a, b) => a - b)
  if (ids.length === 0) return []

  const rows = await tx
    .select({ id: topics.id })
    .from(topics)
    .where(inArray(topics.id, ids))
    .orderBy(asc(topics.id))
    .for('update')

  return rows.map((row) => row.id)
}
