import type { Logger } from '../lib/logger.js'
import type { CalculateAvgTimeJobData, JobHandler } from '../lib/job-queue.js'
import type { StatisticsRecalculator } from '../services/topic-statistics.js'

/** Cron worker: refresh every topic's average reading time. */
export function createCalculateAvgTimeHandler(
  statistics: Pick<StatisticsRecalculator, 'calculateAvgTime'>,
  logger: Logger
): JobHandler<CalculateAvgTimeJobData> {
  return async (job) => {
    const start = Date.now()
    await statistics.calculateAvgTime()
    logger.info({ jobId: job.id, durationMs: Date.now() - start }, 'Average time job finished')
  }
}
