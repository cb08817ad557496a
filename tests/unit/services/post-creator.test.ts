import { describe, it, expect, beforeEach } from 'vitest'
import {
  createPostCreator,
  insertModeratorPost,
  insertPost,
} from '../../../src/services/post-creator.js'
import { posts } from '../../../src/db/schema/posts.js'
import { createMockDb, createMockLogger, queueResults, resetDbMocks } from '../../helpers/mock-db.js'
import { buildPost } from '../../helpers/fixtures.js'

describe('post creator', () => {
  const mockDb = createMockDb()

  beforeEach(() => {
    resetDbMocks(mockDb)
  })

  describe('insertPost', () => {
    it('inserts at the allocated number and bumps the topic', async () => {
      const [, topicChain] = queueResults(mockDb.update, [[{ highestPostNumber: 3 }], []])
      const [insertChain] = queueResults(mockDb.insert, [[buildPost({ id: 7, postNumber: 3 })]])

      const post = await insertPost(mockDb as never, { topicId: 1, userId: 2, raw: 'Reply text' })

      expect(post.id).toBe(7)
      expect(mockDb.insert).toHaveBeenCalledWith(posts)
      expect(insertChain?.values.mock.calls[0]?.[0]).toMatchObject({
        topicId: 1,
        userId: 2,
        raw: 'Reply text',
        postType: 'regular',
        replyToPostNumber: null,
        postNumber: 3,
        sortOrder: 3,
      })

      const set = topicChain?.set.mock.calls[0]?.[0]
      expect(set).toMatchObject({ lastPostUserId: 2, bumpedAt: expect.any(Date) })
    })

    it('leaves bumped_at alone with noBump', async () => {
      const [, topicChain] = queueResults(mockDb.update, [[{ highestPostNumber: 4 }], []])
      queueResults(mockDb.insert, [[buildPost({ postNumber: 4 })]])

      await insertPost(mockDb as never, { topicId: 1, userId: 2, raw: 'Quiet', noBump: true })

      expect(Object.keys(topicChain?.set.mock.calls[0]?.[0] ?? {})).not.toContain('bumpedAt')
    })

    it('counts posts with a reply target as replies', async () => {
      const [allocChain] = queueResults(mockDb.update, [[{ highestPostNumber: 6 }], []])
      queueResults(mockDb.insert, [[buildPost({ postNumber: 6 })]])

      await insertPost(mockDb as never, { topicId: 1, userId: 2, raw: 'Re', replyToPostNumber: 2 })

      expect(Object.keys(allocChain?.set.mock.calls[0]?.[0] ?? {})).toContain('replyCount')
    })
  })

  describe('insertModeratorPost', () => {
    it('places an anchored post without allocating', async () => {
      const [countChain, modChain] = queueResults(mockDb.update, [[], [{ id: 1 }]])
      const [insertChain] = queueResults(mockDb.insert, [
        [buildPost({ postNumber: 4, postType: 'moderator_action' })],
      ])

      const post = await insertModeratorPost(mockDb as never, {
        topicId: 1,
        userId: 9,
        raw: 'Moved',
        postNumber: 4,
      })

      expect(post.postType).toBe('moderator_action')
      expect(insertChain?.values.mock.calls[0]?.[0]).toMatchObject({
        postNumber: 4,
        sortOrder: 4,
        postType: 'moderator_action',
      })
      expect(Object.keys(countChain?.set.mock.calls[0]?.[0] ?? {})).toEqual(['postsCount'])
      expect(Object.keys(modChain?.set.mock.calls[0]?.[0] ?? {})).toEqual(['moderatorPostsCount'])
    })

    it('appends without bumping by default', async () => {
      const [, topicChain, modChain] = queueResults(mockDb.update, [
        [{ highestPostNumber: 10 }],
        [],
        [{ id: 1 }],
      ])
      queueResults(mockDb.insert, [[buildPost({ postNumber: 10, postType: 'moderator_action' })]])

      await insertModeratorPost(mockDb as never, { topicId: 1, userId: 9, raw: 'Closed' })

      expect(Object.keys(topicChain?.set.mock.calls[0]?.[0] ?? {})).not.toContain('bumpedAt')
      expect(Object.keys(modChain?.set.mock.calls[0]?.[0] ?? {})).toEqual(['moderatorPostsCount'])
    })
  })

  describe('createPostCreator', () => {
    it('runs the insert in a transaction', async () => {
      queueResults(mockDb.update, [[{ highestPostNumber: 2 }], []])
      queueResults(mockDb.insert, [[buildPost({ id: 8, postNumber: 2 })]])
      const creator = createPostCreator(mockDb as never, createMockLogger().logger)

      const post = await creator.create({ topicId: 1, userId: 2, raw: 'Hello' })

      expect(post.postNumber).toBe(2)
      expect(mockDb.transaction).toHaveBeenCalledTimes(1)
    })
  })
})
