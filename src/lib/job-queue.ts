import PgBoss from 'pg-boss'
import type { CounterStore } from '../cache/index.js'
import type { Logger } from './logger.js'

/**
 * Job queue built on pg-boss: durable, retried jobs stored next to the forum
 * data. Jobs are queued only after the transaction that caused them commits.
 */

export const JobQueues = {
  CLOSE_TOPIC: 'close_topic',
  INVITE_EMAIL: 'invite_email',
  NOTIFY_MOVED_POSTS: 'notify_moved_posts',
  CALCULATE_AVG_TIME: 'calculate_avg_time',
} as const

export type JobQueueName = (typeof JobQueues)[keyof typeof JobQueues]

export interface CloseTopicJobData {
  topicId: number
  userId: number
}

export interface InviteEmailJobData {
  inviteId: number
}

export interface NotifyMovedPostsJobData {
  postIds: number[]
  movedById: number
}

export type CalculateAvgTimeJobData = Record<string, never>

// Map queue names to their data types
export interface JobDataMap {
  [JobQueues.CLOSE_TOPIC]: CloseTopicJobData
  [JobQueues.INVITE_EMAIL]: InviteEmailJobData
  [JobQueues.NOTIFY_MOVED_POSTS]: NotifyMovedPostsJobData
  [JobQueues.CALCULATE_AVG_TIME]: CalculateAvgTimeJobData
}

/** What the topic services need from a queue. */
export interface JobScheduler {
  /** Run as soon as a worker is free. */
  enqueue<T extends JobQueueName>(queue: T, data: JobDataMap[T]): Promise<void>
  /** Run at `runAt`. `key` identifies the job for a later cancel. */
  schedule<T extends JobQueueName>(queue: T, runAt: Date, data: JobDataMap[T], key: string): Promise<void>
  /** Cancel the job scheduled under `key`, if any. */
  cancel(queue: JobQueueName, key: string): Promise<void>
}

export type JobHandler<T> = (job: PgBoss.Job<T>) => Promise<void>

// Dead letter queue suffix - jobs that exhaust retries go here
const DEAD_LETTER_SUFFIX = '__dlq'

const DEFAULT_JOB_OPTIONS: PgBoss.SendOptions = {
  retryLimit: 3,
  retryDelay: 5,
  retryBackoff: true,
}

/** Scheduled-job key mappings outlive their run time by this much. */
const SCHEDULE_KEY_GRACE_SECONDS = 86_400

function scheduleKey(queue: JobQueueName, key: string): string {
  return `jobs:scheduled:${queue}:${key}`
}

export interface CronSchedule {
  queue: JobQueueName
  cron: string
}

/**
 * Wrapper around pg-boss that provides typed job helpers. The pg-boss job id
 * of a keyed scheduled job is remembered in Valkey so it can be cancelled.
 */
export class JobQueueManager implements JobScheduler {
  private handlers = new Map<JobQueueName, JobHandler<unknown>>()
  private crons: CronSchedule[] = []

  constructor(
    private boss: PgBoss,
    private store: CounterStore,
    private logger: Logger
  ) {}

  /** Register a handler for a job queue. Must be called before start(). */
  registerHandler<T extends JobQueueName>(queue: T, handler: JobHandler<JobDataMap[T]>): void {
    this.handlers.set(queue, handler as JobHandler<unknown>)
  }

  /** Register a recurring job. Must be called before start(). */
  registerCron(schedule: CronSchedule): void {
    this.crons.push(schedule)
  }

  async start(): Promise<void> {
    this.boss.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'pg-boss error')
    })

    await this.boss.start()

    for (const queue of Object.values(JobQueues)) {
      const dlq = `${queue}${DEAD_LETTER_SUFFIX}`
      // Dead letter queue must exist before it is referenced
      await this.boss.createQueue(dlq)
      const queueOptions = { name: queue, deadLetter: dlq }
      await this.boss.createQueue(queue, queueOptions)
    }

    for (const [queue, handler] of this.handlers) {
      await this.boss.work<unknown>(queue, { batchSize: 5 }, async (jobs) => {
        for (const job of jobs) {
          try {
            await handler(job)
          } catch (error: unknown) {
            this.logger.warn({ jobId: job.id, queue, err: error }, 'Job failed, will retry if attempts remain')
            throw error
          }
        }
      })

      const dlq = `${queue}${DEAD_LETTER_SUFFIX}`
      await this.boss.work<unknown>(dlq, async (jobs) => {
        for (const job of jobs) {
          this.logger.error(
            { jobId: job.id, queue: dlq, data: job.data },
            'Job moved to dead letter queue after exhausting retries'
          )
        }
      })

      this.logger.info({ queue, dlq }, 'Job handler registered')
    }

    for (const { queue, cron } of this.crons) {
      await this.boss.schedule(queue, cron, {})
      this.logger.info({ queue, cron }, 'Recurring job scheduled')
    }

    this.logger.info('Job queue started')
  }

  async stop(): Promise<void> {
    await this.boss.stop({ graceful: true, timeout: 30000 })
    this.logger.info('Job queue stopped')
  }

  async enqueue<T extends JobQueueName>(queue: T, data: JobDataMap[T]): Promise<void> {
    const jobId = await this.boss.send(queue, data, DEFAULT_JOB_OPTIONS)
    this.logger.debug({ queue, jobId }, 'Job sent')
  }

  async schedule<T extends JobQueueName>(
    queue: T,
    runAt: Date,
    data: JobDataMap[T],
    key: string
  ): Promise<void> {
    const jobId = await this.boss.send(queue, data, { ...DEFAULT_JOB_OPTIONS, startAfter: runAt })
    if (jobId === null) {
      this.logger.warn({ queue, key }, 'Scheduled job was not created')
      return
    }

    const ttl = Math.max(
      Math.ceil((runAt.getTime() - Date.now()) / 1000) + SCHEDULE_KEY_GRACE_SECONDS,
      SCHEDULE_KEY_GRACE_SECONDS
    )
    await this.store.set(scheduleKey(queue, key), jobId, 'EX', ttl)
    this.logger.debug({ queue, jobId, key, runAt }, 'Job scheduled')
  }

  async cancel(queue: JobQueueName, key: string): Promise<void> {
    const storeKey = scheduleKey(queue, key)
    const jobId = await this.store.get(storeKey)
    if (jobId === null) {
      return
    }

    await this.boss.cancel(queue, jobId)
    await this.store.del(storeKey)
    this.logger.debug({ queue, jobId, key }, 'Scheduled job cancelled')
  }
}

/**
 * Create a job queue instance. The queue must be started with start() before use.
 */
export function createJobQueue(databaseUrl: string, store: CounterStore, logger: Logger): JobQueueManager {
  const boss = new PgBoss({ connectionString: databaseUrl, schema: 'pgboss' })
  return new JobQueueManager(boss, store, logger)
}
