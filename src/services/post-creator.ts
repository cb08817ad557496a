import { eq, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { posts } from '../db/schema/posts.js'
import type { Post, PostType } from '../db/schema/posts.js'
import type { Logger } from '../lib/logger.js'
import { notFound } from '../lib/api-errors.js'
import { runInTransaction } from '../lib/transaction.js'
import { allocatePostNumber } from './sequence-allocator.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreatePostParams {
  topicId: number
  userId: number
  raw: string
  postType?: PostType
  replyToPostNumber?: number | null
  /** Leave bumped_at alone (the post does not count as new activity). */
  noBump?: boolean
}

export interface ModeratorPostParams {
  topicId: number
  userId: number
  raw: string
  bump?: boolean
  /**
   * Place the post at this number and sort order instead of appending it.
   * The caller guarantees the number is free in the topic.
   */
  postNumber?: number
}

export interface PostCreator {
  create(params: CreatePostParams): Promise<Post>
  createModeratorPost(params: ModeratorPostParams): Promise<Post>
}

// ---------------------------------------------------------------------------
// Transaction-scoped helpers
// ---------------------------------------------------------------------------

function firstOrThrow(rows: Post[]): Post {
  const post = rows[0]
  if (!post) {
    throw new Error('Post insert returned no row')
  }
  return post
}

/** Allocate, insert and update the topic's last-post fields. Call inside a transaction. */
export async function insertPost(tx: Executor, params: CreatePostParams): Promise<Post> {
  const { topicId, userId, raw, postType = 'regular', replyToPostNumber = null, noBump = false } = params
  const now = new Date()

  const postNumber = await allocatePostNumber(tx, topicId, replyToPostNumber !== null)

  const post = firstOrThrow(
    await tx
      .insert(posts)
      .values({
        topicId,
        userId,
        raw,
        postType,
        replyToPostNumber,
        postNumber,
        sortOrder: postNumber,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
  )

  await tx
    .update(topics)
    .set({
      postsCount: sql`${topics.postsCount} + 1`,
      lastPostUserId: userId,
      lastPostedAt: now,
      updatedAt: now,
      ...(noBump ? {} : { bumpedAt: now }),
    })
    .where(eq(topics.id, topicId))

  return post
}

/** Create a moderator-action post. Call inside a transaction. */
export async function insertModeratorPost(tx: Executor, params: ModeratorPostParams): Promise<Post> {
  const { topicId, userId, raw, bump = false, postNumber } = params

  let post: Post
  if (postNumber === undefined) {
    post = await insertPost(tx, { topicId, userId, raw, postType: 'moderator_action', noBump: !bump })
  } else {
    const now = new Date()
    post = firstOrThrow(
      await tx
        .insert(posts)
        .values({
          topicId,
          userId,
          raw,
          postType: 'moderator_action',
          postNumber,
          sortOrder: postNumber,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
    )
    await tx
      .update(topics)
      .set({ postsCount: sql`${topics.postsCount} + 1`, ...(bump ? { bumpedAt: now } : {}) })
      .where(eq(topics.id, topicId))
  }

  const updated = await tx
    .update(topics)
    .set({ moderatorPostsCount: sql`${topics.moderatorPostsCount} + 1` })
    .where(eq(topics.id, topicId))
    .returning({ id: topics.id })
  if (updated.length === 0) {
    throw notFound(`Topic ${String(topicId)} not found`)
  }

  return post
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPostCreator(db: Executor, logger: Logger): PostCreator {
  return {
    async create(params: CreatePostParams): Promise<Post> {
      const post = await runInTransaction(db, (tx) => insertPost(tx, params))
      logger.debug(
        { topicId: params.topicId, postId: post.id, postNumber: post.postNumber },
        'Created post'
      )
      return post
    },

    async createModeratorPost(params: ModeratorPostParams): Promise<Post> {
      const post = await runInTransaction(db, (tx) => insertModeratorPost(tx, params))
      logger.debug(
        { topicId: params.topicId, postId: post.id, postNumber: post.postNumber },
        'Created moderator post'
      )
      return post
    },
  }
}
