import { eq, inArray } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import type { Logger } from '../lib/logger.js'
import { notifications } from '../db/schema/notifications.js'
import type { NotificationType } from '../db/schema/notifications.js'
import { posts } from '../db/schema/posts.js'
import { users } from '../db/schema/users.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NotificationService {
  notifyInvitedToPrivateMessage(params: InvitedNotificationParams): Promise<void>
  notifyMovedPosts(params: MovedPostsNotificationParams): Promise<void>
}

export interface InvitedNotificationParams {
  /** The user who was granted access (the recipient). */
  userId: number
  topicId: number
  topicTitle: string
  /** Username of the inviter, shown in the notification. */
  invitedByUsername: string
}

export interface MovedPostsNotificationParams {
  postIds: number[]
  movedById: number
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a notification service for topic events.
 *
 * Notifications are fire-and-forget: failures are logged but never block
 * the calling flow. Authors are not notified about their own actions.
 */
export function createNotificationService(db: Executor, logger: Logger): NotificationService {
  async function insertNotification(
    userId: number,
    type: NotificationType,
    topicId: number,
    postNumber: number,
    data: Record<string, string | number>
  ): Promise<void> {
    await db.insert(notifications).values({ userId, type, topicId, postNumber, data })
  }

  return {
    async notifyInvitedToPrivateMessage(params: InvitedNotificationParams): Promise<void> {
      try {
        await insertNotification(params.userId, 'invited_to_private_message', params.topicId, 1, {
          topicTitle: params.topicTitle,
          displayUsername: params.invitedByUsername,
        })
      } catch (err: unknown) {
        logger.error(
          { err, topicId: params.topicId, userId: params.userId },
          'Failed to generate invite notification'
        )
      }
    },

    async notifyMovedPosts(params: MovedPostsNotificationParams): Promise<void> {
      if (params.postIds.length === 0) return

      try {
        const moverRows = await db
          .select({ username: users.username })
          .from(users)
          .where(eq(users.id, params.movedById))
        const moverName = moverRows[0]?.username ?? 'system'

        const movedPosts = await db
          .select({ userId: posts.userId, topicId: posts.topicId, postNumber: posts.postNumber })
          .from(posts)
          .where(inArray(posts.id, params.postIds))

        const rows = movedPosts
          .filter((post) => post.userId !== params.movedById)
          .map((post) => ({
            userId: post.userId,
            type: 'moved_post' as const,
            topicId: post.topicId,
            postNumber: post.postNumber,
            data: { displayUsername: moverName },
          }))

        if (rows.length > 0) {
          await db.insert(notifications).values(rows)
        }
      } catch (err: unknown) {
        logger.error(
          { err, postIds: params.postIds },
          'Failed to generate moved post notifications'
        )
      }
    },
  }
}
