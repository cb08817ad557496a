import { describe, it, expect, beforeEach } from 'vitest'
import { createNotificationService } from '../../../src/services/notification.js'
import { notifications } from '../../../src/db/schema/notifications.js'
import { createMockDb, createMockLogger, queueResults, resetDbMocks } from '../../helpers/mock-db.js'

describe('notification service', () => {
  const mockDb = createMockDb()
  let log: ReturnType<typeof createMockLogger>

  beforeEach(() => {
    resetDbMocks(mockDb)
    log = createMockLogger()
  })

  function build() {
    return createNotificationService(mockDb as never, log.logger)
  }

  describe('notifyInvitedToPrivateMessage', () => {
    it('notifies the invited user at the first post', async () => {
      const [chain] = queueResults(mockDb.insert, [[]])

      await build().notifyInvitedToPrivateMessage({
        userId: 2,
        topicId: 7,
        topicTitle: 'Private chat about backups',
        invitedByUsername: 'alice',
      })

      expect(mockDb.insert).toHaveBeenCalledWith(notifications)
      expect(chain?.values).toHaveBeenCalledWith({
        userId: 2,
        type: 'invited_to_private_message',
        topicId: 7,
        postNumber: 1,
        data: { topicTitle: 'Private chat about backups', displayUsername: 'alice' },
      })
    })

    it('logs instead of throwing when the insert fails', async () => {
      const failure = new Error('connection reset')
      mockDb.insert.mockImplementationOnce(() => {
        throw failure
      })

      await build().notifyInvitedToPrivateMessage({
        userId: 2,
        topicId: 7,
        topicTitle: 'Private chat about backups',
        invitedByUsername: 'alice',
      })

      expect(log.error).toHaveBeenCalledWith(
        { err: failure, topicId: 7, userId: 2 },
        'Failed to generate invite notification'
      )
    })
  })

  describe('notifyMovedPosts', () => {
    it('notifies every author except the mover', async () => {
      queueResults(mockDb.select, [
        [{ username: 'mod' }],
        [
          { userId: 2, topicId: 20, postNumber: 1 },
          { userId: 9, topicId: 20, postNumber: 2 },
          { userId: 3, topicId: 20, postNumber: 3 },
        ],
      ])
      const [chain] = queueResults(mockDb.insert, [[]])

      await build().notifyMovedPosts({ postIds: [11, 12, 13], movedById: 9 })

      expect(chain?.values).toHaveBeenCalledWith([
        { userId: 2, type: 'moved_post', topicId: 20, postNumber: 1, data: { displayUsername: 'mod' } },
        { userId: 3, type: 'moved_post', topicId: 20, postNumber: 3, data: { displayUsername: 'mod' } },
      ])
    })

    it('names the system when the mover is gone', async () => {
      queueResults(mockDb.select, [[], [{ userId: 2, topicId: 20, postNumber: 4 }]])
      const [chain] = queueResults(mockDb.insert, [[]])

      await build().notifyMovedPosts({ postIds: [11], movedById: 9 })

      expect(chain?.values.mock.calls[0]?.[0]).toEqual([
        { userId: 2, type: 'moved_post', topicId: 20, postNumber: 4, data: { displayUsername: 'system' } },
      ])
    })

    it('skips the insert when only the mover wrote the posts', async () => {
      queueResults(mockDb.select, [[{ username: 'mod' }], [{ userId: 9, topicId: 20, postNumber: 2 }]])

      await build().notifyMovedPosts({ postIds: [12], movedById: 9 })

      expect(mockDb.insert).not.toHaveBeenCalled()
    })

    it('does nothing without posts', async () => {
      await build().notifyMovedPosts({ postIds: [], movedById: 9 })

      expect(mockDb.select).not.toHaveBeenCalled()
    })
  })
})
