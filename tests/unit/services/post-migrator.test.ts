import { describe, it, expect, beforeEach, vi } from 'vitest'
import { PgDialect } from 'drizzle-orm/pg-core'
import type { SQL } from 'drizzle-orm'
import {
  createPostMigrator,
  findForeignPostIds,
  planPostMigration,
} from '../../../src/services/post-migrator.js'
import { JobQueues } from '../../../src/lib/job-queue.js'
import { createMockDb, createMockLogger, queueResults, resetDbMocks } from '../../helpers/mock-db.js'
import { buildPost, buildTopic, buildUser, testSettings } from '../../helpers/fixtures.js'

describe('planPostMigration', () => {
  it('copies the opening post and numbers moves after the destination maximum', () => {
    const candidates = [
      { id: 10, postNumber: 1, userId: 1, raw: 'Opening' },
      { id: 11, postNumber: 3, userId: 2, raw: 'Second' },
      { id: 12, postNumber: 4, userId: 3, raw: 'Third' },
    ]

    const plan = planPostMigration(candidates, 7)

    expect(plan.copies).toEqual([{ source: candidates[0], postNumber: 8 }])
    expect(plan.moves).toEqual([
      { postId: 11, postNumber: 9 },
      { postId: 12, postNumber: 10 },
    ])
    expect(plan.firstMovedPostNumber).toBe(3)
  })

  it('reports no moved post when only the opening post is selected', () => {
    const plan = planPostMigration([{ id: 10, postNumber: 1, userId: 1, raw: 'Opening' }], 0)

    expect(plan.moves).toEqual([])
    expect(plan.firstMovedPostNumber).toBeNull()
  })
})

describe('findForeignPostIds', () => {
  it('returns requested ids that were not found', () => {
    expect(findForeignPostIds([1, 2, 3], [2])).toEqual([1, 3])
  })
})

describe('createPostMigrator', () => {
  const mockDb = createMockDb()
  const source = buildTopic({ id: 1, title: 'Backups keep failing overnight' })
  const destination = buildTopic({ id: 20, title: 'Restore questions', slug: 'restore-questions' })
  const mover = buildUser({ id: 9, username: 'mod', moderator: true })

  const guardian = { canSee: vi.fn() }
  const jobs = { enqueue: vi.fn(), schedule: vi.fn(), cancel: vi.fn() }
  const postCreator = { create: vi.fn(), createModeratorPost: vi.fn() }
  const statistics = { recalculate: vi.fn(), calculateAvgTime: vi.fn() }
  const posters = { featureTopicUsers: vi.fn(), selectFeatured: vi.fn(), invalidate: vi.fn() }
  const topicCreator = { checkTitle: vi.fn(), insertTopic: vi.fn(), create: vi.fn() }

  let log: ReturnType<typeof createMockLogger>

  beforeEach(() => {
    vi.clearAllMocks()
    resetDbMocks(mockDb)
    log = createMockLogger()
    guardian.canSee.mockResolvedValue(true)
    jobs.enqueue.mockResolvedValue(undefined)
    postCreator.createModeratorPost.mockResolvedValue(buildPost({ postType: 'moderator_action' }))
    statistics.recalculate.mockResolvedValue({ highestPostNumber: 1, postsCount: 1 })
    posters.featureTopicUsers.mockResolvedValue([])
    topicCreator.checkTitle.mockImplementation((title: string) => Promise.resolve(title.trim()))
    topicCreator.insertTopic.mockResolvedValue(destination)
  })

  function build() {
    return createPostMigrator({
      db: mockDb as never,
      logger: log.logger,
      guardian: guardian as never,
      jobs,
      postCreator,
      statistics,
      posters,
      topicCreator: topicCreator as never,
      settings: testSettings,
    })
  }

  it('moves replies into a new topic', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [
        { id: 11, postNumber: 2, userId: 2, raw: 'Reply one' },
        { id: 12, postNumber: 3, userId: 3, raw: 'Reply two' },
      ],
      [{ value: null }],
    ])
    const [firstMove, secondMove, counterRaise] = queueResults(mockDb.update, [
      [{ id: 11 }],
      [{ id: 12 }],
      [],
    ])

    const result = await build().movePosts(mover, 1, [11, 12, 11], { title: ' Restore questions ' })

    expect(result).toEqual({ destination, firstMovedPostNumber: 2, movedPostIds: [11, 12] })
    expect(topicCreator.insertTopic).toHaveBeenCalledWith(mockDb, {
      user: mover,
      title: 'Restore questions',
      archetype: 'regular',
      categoryId: null,
      autoCloseAt: null,
      autoCloseUserId: null,
    })
    expect(firstMove?.set.mock.calls[0]?.[0]).toMatchObject({ topicId: 20, postNumber: 1, sortOrder: 1 })
    expect(secondMove?.set.mock.calls[0]?.[0]).toMatchObject({ topicId: 20, postNumber: 2 })
    expect(mockDb.insert).not.toHaveBeenCalled()

    const raise = counterRaise?.set.mock.calls[0]?.[0] as Record<string, SQL>
    const rendered = new PgDialect().sqlToQuery(raise['highestPostNumber'] as SQL)
    expect(rendered.sql).toBe('GREATEST("topics"."highest_post_number", $1)')
    expect(rendered.params).toEqual([2])

    expect(postCreator.createModeratorPost).toHaveBeenCalledWith({
      topicId: 1,
      userId: 9,
      raw: 'I moved 2 posts to a new topic: [Restore questions](https://forum.example.com/t/restore-questions/20)',
      postNumber: 2,
    })
    expect(statistics.recalculate.mock.calls).toEqual([[20], [1]])
    expect(posters.invalidate.mock.calls).toEqual([[20], [1]])
    expect(jobs.enqueue).toHaveBeenCalledWith(JobQueues.NOTIFY_MOVED_POSTS, {
      postIds: [11, 12],
      movedById: 9,
    })
  })

  it('copies the opening post and appends the moderator post', async () => {
    queueResults(mockDb.select, [
      [source],
      [destination],
      [{ id: 1 }, { id: 20 }],
      [{ id: 10, postNumber: 1, userId: 1, raw: 'Opening' }],
      [{ value: 5 }],
    ])
    const [insertChain] = queueResults(mockDb.insert, [[]])

    const result = await build().movePosts(mover, 1, [10], { topicId: 20 })

    expect(result.movedPostIds).toEqual([])
    expect(result.firstMovedPostNumber).toBeNull()
    expect(insertChain?.values).toHaveBeenCalledWith({
      topicId: 20,
      userId: 1,
      raw: 'Opening',
      postNumber: 6,
      sortOrder: 6,
    })
    expect(postCreator.createModeratorPost).toHaveBeenCalledWith({
      topicId: 1,
      userId: 9,
      raw: 'I moved a post to an existing topic: [Restore questions](https://forum.example.com/t/restore-questions/20)',
    })
    expect(jobs.enqueue).toHaveBeenCalledWith(JobQueues.NOTIFY_MOVED_POSTS, {
      postIds: [10],
      movedById: 9,
    })
  })

  it('rejects posts from other topics', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [{ id: 11, postNumber: 2, userId: 2, raw: 'Reply one' }],
    ])

    await expect(build().movePosts(mover, 1, [11, 40], { title: 'Restore questions' })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      details: { postIds: [40] },
    })
    expect(topicCreator.insertTopic).not.toHaveBeenCalled()
    expect(postCreator.createModeratorPost).not.toHaveBeenCalled()
  })

  it('fails with a conflict when a post left the source meanwhile', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [
        { id: 11, postNumber: 2, userId: 2, raw: 'Reply one' },
        { id: 12, postNumber: 3, userId: 3, raw: 'Reply two' },
      ],
      [{ value: 0 }],
    ])
    queueResults(mockDb.update, [[{ id: 11 }], []])

    await expect(build().movePosts(mover, 1, [11, 12], { title: 'Restore questions' })).rejects.toMatchObject({
      code: 'CONCURRENCY_CONFLICT',
      details: { postIds: [12] },
    })
    expect(jobs.enqueue).not.toHaveBeenCalled()
  })

  it('rejects an empty selection', async () => {
    await expect(build().movePosts(mover, 1, [], { topicId: 20 })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      details: { postIds: [] },
    })
    expect(mockDb.select).not.toHaveBeenCalled()
  })

  it('rejects moving into the source topic', async () => {
    queueResults(mockDb.select, [[source]])

    await expect(build().movePosts(mover, 1, [11], { topicId: 1 })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    })
  })

  it('rejects a destination the mover cannot see', async () => {
    queueResults(mockDb.select, [[source], [destination]])
    guardian.canSee.mockResolvedValue(false)

    await expect(build().movePosts(mover, 1, [11], { topicId: 20 })).rejects.toMatchObject({
      code: 'PERMISSION_DENIED',
    })
    expect(mockDb.transaction).not.toHaveBeenCalled()
  })

  it('fails with NotFound for a missing destination', async () => {
    queueResults(mockDb.select, [[source], []])

    await expect(build().movePosts(mover, 1, [11], { topicId: 99 })).rejects.toMatchObject({
      code: 'NOT_FOUND',
    })
  })

  it('logs a failed notification enqueue without failing the move', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [{ id: 11, postNumber: 2, userId: 2, raw: 'Reply one' }],
      [{ value: 0 }],
    ])
    queueResults(mockDb.update, [[{ id: 11 }]])
    const failure = new Error('queue down')
    jobs.enqueue.mockRejectedValue(failure)

    const result = await build().movePosts(mover, 1, [11], { title: 'Restore questions' })

    expect(result.movedPostIds).toEqual([11])
    expect(log.error).toHaveBeenCalledWith(
      { err: failure, sourceTopicId: 1 },
      'Failed to queue moved post notifications'
    )
  })

  it('still recounts both topics and queues notifications when the moderator post fails', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [{ id: 11, postNumber: 2, userId: 2, raw: 'Reply one' }],
      [{ value: 0 }],
    ])
    queueResults(mockDb.update, [[{ id: 11 }]])
    const failure = new Error('db blip')
    postCreator.createModeratorPost.mockRejectedValue(failure)

    const result = await build().movePosts(mover, 1, [11], { title: 'Restore questions' })

    expect(result.movedPostIds).toEqual([11])
    expect(statistics.recalculate.mock.calls).toEqual([[20], [1]])
    expect(posters.featureTopicUsers.mock.calls).toEqual([[20], [1]])
    expect(jobs.enqueue).toHaveBeenCalledWith(JobQueues.NOTIFY_MOVED_POSTS, {
      postIds: [11],
      movedById: 9,
    })
    expect(log.error).toHaveBeenCalledWith(
      { err: failure, sourceTopicId: 1 },
      'Failed to create move moderator post'
    )
  })

  it('refreshes the source topic even when the destination refresh fails', async () => {
    queueResults(mockDb.select, [
      [source],
      [{ id: 1 }],
      [{ id: 11, postNumber: 2, userId: 2, raw: 'Reply one' }],
      [{ value: 0 }],
    ])
    queueResults(mockDb.update, [[{ id: 11 }]])
    const failure = new Error('recount failed')
    statistics.recalculate.mockRejectedValueOnce(failure)

    await build().movePosts(mover, 1, [11], { title: 'Restore questions' })

    expect(statistics.recalculate.mock.calls).toEqual([[20], [1]])
    expect(posters.invalidate.mock.calls).toEqual([[1]])
    expect(jobs.enqueue).toHaveBeenCalledTimes(1)
    expect(log.error).toHaveBeenCalledWith(
      { err: failure, sourceTopicId: 1, topicId: 20 },
      'Failed to refresh topic after move'
    )
  })
})
