import { describe, it, expect, beforeEach } from 'vitest'
import { PgDialect } from 'drizzle-orm/pg-core'
import type { SQL } from 'drizzle-orm'
import { allocatePostNumber, lockTopicRows } from '../../../src/services/sequence-allocator.js'
import { topics } from '../../../src/db/schema/topics.js'
import { createMockDb, queueResults, resetDbMocks } from '../../helpers/mock-db.js'

const dialect = new PgDialect()

function render(query: SQL): { sql: string; params: unknown[] } {
  return dialect.sqlToQuery(query)
}

describe('allocatePostNumber', () => {
  const mockDb = createMockDb()

  beforeEach(() => {
    resetDbMocks(mockDb)
  })

  it('returns the counter value written by the update', async () => {
    const [chain] = queueResults(mockDb.update, [[{ highestPostNumber: 5 }]])

    const postNumber = await allocatePostNumber(mockDb as never, 12, false)

    expect(postNumber).toBe(5)
    expect(mockDb.update).toHaveBeenCalledWith(topics)
    expect(Object.keys(chain?.set.mock.calls[0]?.[0] ?? {})).toEqual(['highestPostNumber'])
  })

  it('increments reply_count in the same statement for replies', async () => {
    const [chain] = queueResults(mockDb.update, [[{ highestPostNumber: 2 }]])

    await allocatePostNumber(mockDb as never, 12, true)

    expect(Object.keys(chain?.set.mock.calls[0]?.[0] ?? {})).toEqual([
      'highestPostNumber',
      'replyCount',
    ])
  })

  it('fails with NotFound when the topic does not exist', async () => {
    queueResults(mockDb.update, [[]])

    await expect(allocatePostNumber(mockDb as never, 404, false)).rejects.toMatchObject({
      statusCode: 404,
      code: 'NOT_FOUND',
    })
  })

  it('computes the next number in the UPDATE from the counter and the stored maximum', async () => {
    const [chain] = queueResults(mockDb.update, [[{ highestPostNumber: 7 }]])

    await allocatePostNumber(mockDb as never, 12, true)

    const set = chain?.set.mock.calls[0]?.[0] as Record<string, SQL>
    const next = render(set['highestPostNumber'] as SQL)
    expect(next.sql).toBe(
      'GREATEST("topics"."highest_post_number", (SELECT COALESCE(MAX("posts"."post_number"), 0) FROM "posts" WHERE "posts"."topic_id" = $1)) + 1'
    )
    expect(next.params).toEqual([12])
    expect(render(set['replyCount'] as SQL).sql).toBe('"topics"."reply_count" + 1')
    expect(chain?.returning).toHaveBeenCalledWith({ highestPostNumber: topics.highestPostNumber })
  })
})

describe('lockTopicRows', () => {
  const mockDb = createMockDb()

  beforeEach(() => {
    resetDbMocks(mockDb)
  })

  it('locks rows in ascending id order', async () => {
    const [chain] = queueResults(mockDb.select, [[{ id: 3 }, { id: 8 }]])

    const locked = await lockTopicRows(mockDb as never, [8, 3, 8])

    expect(locked).toEqual([3, 8])
    expect(chain?.orderBy).toHaveBeenCalledTimes(1)
    expect(chain?.for).toHaveBeenCalledWith('update')
  })

  it('skips the query for an empty list', async () => {
    expect(await lockTopicRows(mockDb as never, [])).toEqual([])
    expect(mockDb.select).not.toHaveBeenCalled()
  })
})
