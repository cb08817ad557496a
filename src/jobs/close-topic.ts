import type { Logger } from '../lib/logger.js'
import type { CloseTopicJobData, JobHandler } from '../lib/job-queue.js'
import type { TopicService } from '../services/topic.js'

/** Worker for scheduled auto-close jobs. */
export function createCloseTopicHandler(
  topicService: Pick<TopicService, 'closeIfDue'>,
  logger: Logger
): JobHandler<CloseTopicJobData> {
  return async (job) => {
    const { topicId, userId } = job.data
    const closed = await topicService.closeIfDue(topicId, userId)
    if (closed) {
      logger.info({ jobId: job.id, topicId }, 'Auto-closed topic')
    }
  }
}
