import type { JobHandler, NotifyMovedPostsJobData } from '../lib/job-queue.js'
import type { NotificationService } from '../services/notification.js'

export function createNotifyMovedPostsHandler(
  notifications: Pick<NotificationService, 'notifyMovedPosts'>
): JobHandler<NotifyMovedPostsJobData> {
  return async (job) => {
    await notifications.notifyMovedPosts(job.data)
  }
}
