import Fastify from 'fastify'
import helmet from '@fastify/helmet'
import cors from '@fastify/cors'
import rateLimit from '@fastify/rate-limit'
import swagger from '@fastify/swagger'
import * as Sentry from '@sentry/node'
import type { FastifyError } from 'fastify'
import type { Env } from './config/env.js'
import { topicSettingsFromEnv } from './config/env.js'
import { createDb } from './db/index.js'
import type { Database } from './db/index.js'
import { createCache } from './cache/index.js'
import type { Cache } from './cache/index.js'
import { createSessionService } from './auth/session.js'
import type { SessionService } from './auth/session.js'
import { createAuthMiddleware } from './auth/middleware.js'
import type { AuthMiddleware, RequestUser } from './auth/middleware.js'
import { createGuardian } from './auth/guardian.js'
import type { Guardian } from './auth/guardian.js'
import { isApiError } from './lib/api-errors.js'
import { createJobQueue, JobQueues } from './lib/job-queue.js'
import type { JobQueueManager } from './lib/job-queue.js'
import { createRateLimiterFactory } from './services/rate-limiter.js'
import { createNotificationService } from './services/notification.js'
import { createStatisticsRecalculator } from './services/topic-statistics.js'
import { createTopicService } from './services/topic.js'
import type { TopicService } from './services/topic.js'
import { createCloseTopicHandler } from './jobs/close-topic.js'
import { createNotifyMovedPostsHandler } from './jobs/notify-moved-posts.js'
import { createCalculateAvgTimeHandler } from './jobs/calculate-avg-time.js'
import healthRoutes from './routes/health.js'
import { topicRoutes } from './routes/topics.js'

// Extend Fastify types with decorated properties
declare module 'fastify' {
  interface FastifyInstance {
    db: Database
    cache: Cache
    env: Env
    sessionService: SessionService
    authMiddleware: AuthMiddleware
    guardian: Guardian
    jobQueue: JobQueueManager
    topicService: TopicService
  }
}

export async function buildApp(env: Env) {
  // Initialize GlitchTip/Sentry if DSN provided
  if (env.GLITCHTIP_DSN) {
    Sentry.init({
      dsn: env.GLITCHTIP_DSN,
      environment: env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace' ? 'development' : 'production',
    })
  }

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace'
        ? { transport: { target: 'pino-pretty' } }
        : {}),
    },
    trustProxy: true,
  })

  // Database
  const { db, client: dbClient } = createDb(env.DATABASE_URL)
  app.decorate('db', db)
  app.decorate('env', env)

  // Cache
  const cache = createCache(env.VALKEY_URL, app.log)
  app.decorate('cache', cache)

  // Jobs
  const jobQueue = createJobQueue(env.DATABASE_URL, cache, app.log)
  app.decorate('jobQueue', jobQueue)

  // Security headers
  await app.register(helmet, {
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
  })

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS.split(',').map((o) => o.trim()),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  })

  // Rate limiting: reads get the generous budget, writes the strict one
  await app.register(rateLimit, {
    max: (request) => (request.method === 'GET' ? env.RATE_LIMIT_READ : env.RATE_LIMIT_WRITE),
    timeWindow: '1 minute',
  })

  // Session service
  const sessionService = createSessionService(cache, app.log)
  app.decorate('sessionService', sessionService)

  const guardian = createGuardian(db)
  app.decorate('guardian', guardian)

  // Auth middleware (request decoration must happen before hooks can set the property)
  app.decorateRequest('user', undefined as RequestUser | undefined)
  const authMiddleware = createAuthMiddleware(sessionService, guardian, app.log)
  app.decorate('authMiddleware', authMiddleware)

  // Topic engine
  const notifications = createNotificationService(db, app.log)
  const topicService = createTopicService({
    db,
    logger: app.log,
    guardian,
    jobs: jobQueue,
    rateLimiter: createRateLimiterFactory(cache),
    settings: topicSettingsFromEnv(env),
    notifications,
  })
  app.decorate('topicService', topicService)

  jobQueue.registerHandler(JobQueues.CLOSE_TOPIC, createCloseTopicHandler(topicService, app.log))
  jobQueue.registerHandler(JobQueues.NOTIFY_MOVED_POSTS, createNotifyMovedPostsHandler(notifications))
  jobQueue.registerHandler(
    JobQueues.CALCULATE_AVG_TIME,
    createCalculateAvgTimeHandler(createStatisticsRecalculator(db, app.log), app.log)
  )
  jobQueue.registerCron({ queue: JobQueues.CALCULATE_AVG_TIME, cron: env.AVG_TIME_CRON })

  // OpenAPI documentation (register before routes so schemas are collected)
  await app.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Forum Topic API',
        description: 'Topics, posts and per-user topic state.',
        version: '0.1.0',
      },
      servers: [
        {
          url: env.PUBLIC_URL,
          description: 'Primary server',
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            description: 'Access token issued by the account service',
          },
        },
      },
    },
  })

  // Routes
  await app.register(healthRoutes)
  await app.register(topicRoutes())

  // OpenAPI spec endpoint (after routes so all schemas are registered)
  app.get('/api/openapi.json', { schema: { hide: true } }, async (_request, reply) => {
    return reply.header('Content-Type', 'application/json').send(app.swagger())
  })

  // Start job workers when app is ready
  app.addHook('onReady', async () => {
    await jobQueue.start()
  })

  // Graceful shutdown: stop workers before closing DB
  app.addHook('onClose', async () => {
    app.log.info('Shutting down...')
    await jobQueue.stop()
    await cache.quit()
    await dbClient.end()
    app.log.info('Connections closed')
  })

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isApiError(error)) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...(error.details === undefined ? {} : { details: error.details }),
      })
    }

    const statusCode = error.statusCode ?? 500
    if (statusCode < 500) {
      return reply.status(statusCode).send({ error: error.code, message: error.message })
    }

    // GlitchTip
    if (env.GLITCHTIP_DSN) {
      Sentry.captureException(error)
    }
    app.log.error({ err: error, requestId: request.id }, 'Unhandled error')
    return reply.status(statusCode).send({
      error: 'Internal Server Error',
      message:
        env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace'
          ? error.message
          : 'An unexpected error occurred',
      statusCode,
    })
  })

  return app
}
