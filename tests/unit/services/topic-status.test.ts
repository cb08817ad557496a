import { describe, it, expect, beforeEach, vi } from 'vitest'
import {
  autoClosedDays,
  closeJobKey,
  createTopicStatusManager,
  planAutoCloseChange,
  shouldBump,
  statusColumnUpdate,
  statusMessageKey,
} from '../../../src/services/topic-status.js'
import { JobQueues } from '../../../src/lib/job-queue.js'
import { createMockDb, createMockLogger, queueResults, resetDbMocks } from '../../helpers/mock-db.js'
import { buildPost, buildTopic, buildUser } from '../../helpers/fixtures.js'

const AT = new Date('2026-03-05T08:00:00.000Z')
const LATER = new Date('2026-03-06T08:00:00.000Z')

describe('status rules', () => {
  it('maps a property and value to its message key', () => {
    expect(statusMessageKey('pinned', true)).toBe('topic_statuses.pinned_enabled')
    expect(statusMessageKey('visible', false)).toBe('topic_statuses.visible_disabled')
  })

  it('bumps only when a topic is reopened', () => {
    expect(shouldBump('closed', false)).toBe(true)
    expect(shouldBump('autoclosed', false)).toBe(true)
    expect(shouldBump('closed', true)).toBe(false)
    expect(shouldBump('archived', false)).toBe(false)
  })

  it('stores pinned as a timestamp and autoclosed as closed', () => {
    expect(statusColumnUpdate('pinned', true, AT)).toEqual({ pinnedAt: AT })
    expect(statusColumnUpdate('pinned', false, AT)).toEqual({ pinnedAt: null })
    expect(statusColumnUpdate('autoclosed', true, AT)).toEqual({ closed: true })
    expect(statusColumnUpdate('visible', false, AT)).toEqual({ visible: false })
  })

  it('counts days up to the auto-close time, or now without one', () => {
    const createdAt = new Date('2026-03-01T08:00:00.000Z')

    expect(autoClosedDays(createdAt, AT, LATER)).toBe(4)
    expect(autoClosedDays(createdAt, null, LATER)).toBe(5)
    expect(autoClosedDays(createdAt, new Date('2026-03-01T20:00:00.000Z'), LATER)).toBe(1)
  })

  it('keys the close job by topic id', () => {
    expect(closeJobKey(42)).toBe('42')
  })
})

describe('planAutoCloseChange', () => {
  const none = { autoCloseAt: null, autoCloseUserId: null }

  it('schedules a new auto-close as the creator when no user is given', () => {
    expect(planAutoCloseChange(none, { autoCloseAt: AT, autoCloseUserId: null }, 3)).toEqual({
      cancel: false,
      schedule: { runAt: AT, userId: 3 },
    })
  })

  it('cancels and reschedules when the time moves', () => {
    expect(
      planAutoCloseChange({ autoCloseAt: AT, autoCloseUserId: 5 }, { autoCloseAt: LATER, autoCloseUserId: 5 }, 3)
    ).toEqual({ cancel: true, schedule: { runAt: LATER, userId: 5 } })
  })

  it('only cancels when the auto-close is cleared', () => {
    expect(planAutoCloseChange({ autoCloseAt: AT, autoCloseUserId: 5 }, none, 3)).toEqual({
      cancel: true,
      schedule: null,
    })
  })

  it('reschedules when only the acting user changes', () => {
    expect(
      planAutoCloseChange({ autoCloseAt: AT, autoCloseUserId: 5 }, { autoCloseAt: AT, autoCloseUserId: 6 }, 3)
    ).toEqual({ cancel: true, schedule: { runAt: AT, userId: 6 } })
  })

  it('does nothing when the same instant is set again', () => {
    expect(
      planAutoCloseChange(
        { autoCloseAt: AT, autoCloseUserId: 5 },
        { autoCloseAt: new Date(AT.getTime()), autoCloseUserId: 5 },
        3
      )
    ).toEqual({ cancel: false, schedule: null })
  })
})

describe('createTopicStatusManager', () => {
  const mockDb = createMockDb()
  const jobs = { enqueue: vi.fn(), schedule: vi.fn(), cancel: vi.fn() }
  const moderator = buildUser({ id: 9, username: 'mod', moderator: true })
  let log: ReturnType<typeof createMockLogger>

  beforeEach(() => {
    vi.clearAllMocks()
    resetDbMocks(mockDb)
    log = createMockLogger()
    jobs.schedule.mockResolvedValue(undefined)
    jobs.cancel.mockResolvedValue(undefined)
  })

  function build() {
    return createTopicStatusManager({ db: mockDb as never, logger: log.logger, jobs })
  }

  describe('updateStatus', () => {
    it('closes the topic with a moderator post that does not bump', async () => {
      const topic = buildTopic({ closed: true })
      const [statusUpdate, , lastPostUpdate] = queueResults(mockDb.update, [
        [topic],
        [{ highestPostNumber: 2 }],
        [],
        [{ id: 1 }],
      ])
      const [postInsert] = queueResults(mockDb.insert, [
        [buildPost({ id: 50, postNumber: 2, postType: 'moderator_action', userId: 9 })],
      ])

      const result = await build().updateStatus(1, 'closed', true, moderator)

      expect(result.topic).toBe(topic)
      expect(result.post.postNumber).toBe(2)
      expect(statusUpdate?.set.mock.calls[0]?.[0]).toMatchObject({ closed: true })
      expect(postInsert?.values.mock.calls[0]?.[0]).toMatchObject({
        userId: 9,
        postType: 'moderator_action',
        raw: 'This topic is now closed. New replies are no longer allowed.',
      })
      expect(Object.keys(lastPostUpdate?.set.mock.calls[0]?.[0] ?? {})).not.toContain('bumpedAt')
      expect(log.info).toHaveBeenCalledWith(
        { topicId: 1, property: 'closed', value: true, userId: 9 },
        'Updated topic status'
      )
    })

    it('bumps the topic when it is reopened', async () => {
      const [, , lastPostUpdate] = queueResults(mockDb.update, [
        [buildTopic()],
        [{ highestPostNumber: 3 }],
        [],
        [{ id: 1 }],
      ])
      queueResults(mockDb.insert, [[buildPost({ postNumber: 3, postType: 'moderator_action' })]])

      await build().updateStatus(1, 'closed', false, moderator)

      expect(lastPostUpdate?.set.mock.calls[0]?.[0]).toMatchObject({ bumpedAt: expect.any(Date) })
    })

    it('states the auto-close period in days', async () => {
      const topic = buildTopic({
        closed: true,
        createdAt: new Date('2026-01-10T10:00:00.000Z'),
        autoCloseAt: new Date('2026-01-13T10:00:00.000Z'),
      })
      queueResults(mockDb.update, [[topic], [{ highestPostNumber: 2 }], [], [{ id: 1 }]])
      const [postInsert] = queueResults(mockDb.insert, [[buildPost({ postType: 'moderator_action' })]])

      await build().updateStatus(1, 'autoclosed', true, moderator)

      expect(postInsert?.values.mock.calls[0]?.[0]).toMatchObject({
        raw: 'This topic was automatically closed after 3 days. New replies are no longer allowed.',
      })
    })

    it('fails with NotFound for a missing topic', async () => {
      queueResults(mockDb.update, [[]])

      await expect(build().updateStatus(404, 'archived', true, moderator)).rejects.toMatchObject({
        code: 'NOT_FOUND',
      })
      expect(mockDb.insert).not.toHaveBeenCalled()
    })
  })

  describe('setAutoClose', () => {
    it('schedules the close job after the update', async () => {
      queueResults(mockDb.select, [[{ autoCloseAt: null, autoCloseUserId: null }]])
      queueResults(mockDb.update, [[buildTopic({ userId: 5, autoCloseAt: AT, autoCloseUserId: 7 })]])

      const topic = await build().setAutoClose(1, { autoCloseAt: AT, autoCloseUserId: 7 })

      expect(topic.autoCloseAt).toBe(AT)
      expect(jobs.cancel).not.toHaveBeenCalled()
      expect(jobs.schedule).toHaveBeenCalledWith(
        JobQueues.CLOSE_TOPIC,
        AT,
        { topicId: 1, userId: 7 },
        '1'
      )
    })

    it('drops the acting user and cancels the job when cleared', async () => {
      queueResults(mockDb.select, [[{ autoCloseAt: AT, autoCloseUserId: 7 }]])
      const [update] = queueResults(mockDb.update, [[buildTopic()]])

      await build().setAutoClose(1, { autoCloseAt: null, autoCloseUserId: 7 })

      expect(update?.set.mock.calls[0]?.[0]).toMatchObject({ autoCloseAt: null, autoCloseUserId: null })
      expect(jobs.cancel).toHaveBeenCalledWith(JobQueues.CLOSE_TOPIC, '1')
      expect(jobs.schedule).not.toHaveBeenCalled()
    })

    it('logs a scheduling failure without failing the update', async () => {
      queueResults(mockDb.select, [[{ autoCloseAt: null, autoCloseUserId: null }]])
      queueResults(mockDb.update, [[buildTopic({ autoCloseAt: AT })]])
      const failure = new Error('queue down')
      jobs.schedule.mockRejectedValue(failure)

      await build().setAutoClose(1, { autoCloseAt: AT, autoCloseUserId: null })

      expect(log.error).toHaveBeenCalledWith(
        { err: failure, topicId: 1 },
        'Failed to update scheduled auto-close'
      )
    })

    it('fails with NotFound for a missing topic', async () => {
      await expect(build().setAutoClose(404, { autoCloseAt: AT, autoCloseUserId: null })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      })
    })
  })
})
