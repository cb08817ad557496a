import { z } from 'zod/v4'
import type { FastifyPluginCallback } from 'fastify'
import { invalidArgument } from '../lib/api-errors.js'
import { authenticatedUser } from '../auth/middleware.js'
import {
  createPostSchema,
  createTopicSchema,
  inviteSchema,
  movePostsSchema,
  notificationLevelSchema,
  starSchema,
  topicIdParamsSchema,
  updateStatusSchema,
  updateTopicSchema,
} from '../validation/topics.js'
import { NOTIFICATION_LEVELS } from '../services/topic-state.js'
import type { MoveDestination } from '../services/post-migrator.js'

// ---------------------------------------------------------------------------
// OpenAPI JSON Schema definitions
// ---------------------------------------------------------------------------

const idParamsJsonSchema = {
  type: 'object' as const,
  required: ['id'],
  properties: {
    id: { type: 'integer' as const, minimum: 1 },
  },
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseInput<T>(schema: z.ZodType<T>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw invalidArgument(`${message}: ${z.prettifyError(parsed.error)}`)
  }
  return parsed.data
}

function toDestination(body: { title?: string | undefined; destinationTopicId?: number | undefined }): MoveDestination {
  if (body.destinationTopicId !== undefined) {
    return { topicId: body.destinationTopicId }
  }
  return { title: body.title ?? '' }
}

// ---------------------------------------------------------------------------
// Topic routes plugin
// ---------------------------------------------------------------------------

/**
 * Topic routes.
 *
 * - GET    /api/topics/:id                     -- Topic with poster summary
 * - POST   /api/topics                         -- Create a topic or private message
 * - PUT    /api/topics/:id                     -- Edit title, category, auto-close
 * - DELETE /api/topics/:id                     -- Trash (staff)
 * - POST   /api/topics/:id/recover             -- Recover (staff)
 * - POST   /api/topics/:id/posts               -- Reply
 * - PUT    /api/topics/:id/status              -- Close, archive, pin, hide (staff)
 * - POST   /api/topics/:id/move-posts          -- Move posts (staff)
 * - POST   /api/topics/:id/invite              -- Invite by username or email
 * - PUT    /api/topics/:id/star                -- Star or unstar
 * - PUT    /api/topics/:id/mute                -- Toggle mute
 * - PUT    /api/topics/:id/notification-level  -- Set notification level
 * - PUT    /api/topics/:id/clear-pin           -- Hide the pin for the caller
 * - POST   /api/topics/:id/recalculate         -- Recount statistics (staff)
 */
export function topicRoutes(): FastifyPluginCallback {
  return (app, _opts, done) => {
    const { authMiddleware, topicService } = app

    // -------------------------------------------------------------------
    // GET /api/topics/:id (optional auth)
    // -------------------------------------------------------------------

    app.get(
      '/api/topics/:id',
      {
        preHandler: [authMiddleware.optionalAuth],
        schema: { tags: ['Topics'], summary: 'Get a topic', params: idParamsJsonSchema },
      },
      async (request, reply) => {
        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const topic = await topicService.getTopic(id, request.user)
        return reply.status(200).send(topic)
      }
    )

    // -------------------------------------------------------------------
    // POST /api/topics (auth required)
    // -------------------------------------------------------------------

    app.post(
      '/api/topics',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: { tags: ['Topics'], summary: 'Create a topic', security: [{ bearerAuth: [] }] },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const body = parseInput(createTopicSchema, request.body, 'Invalid topic data')
        const { topic, firstPost } = await topicService.create({
          userId: user.id,
          title: body.title,
          ...(body.raw === undefined ? {} : { raw: body.raw }),
          ...(body.archetype === undefined ? {} : { archetype: body.archetype }),
          ...(body.categoryId === undefined ? {} : { categoryId: body.categoryId }),
          ...(body.autoCloseDays === undefined ? {} : { autoCloseDays: body.autoCloseDays }),
        })

        return reply.status(201).send({
          id: topic.id,
          title: topic.title,
          slug: topic.slug,
          archetype: topic.archetype,
          categoryId: topic.categoryId,
          firstPostId: firstPost?.id ?? null,
          createdAt: topic.createdAt.toISOString(),
        })
      }
    )

    // -------------------------------------------------------------------
    // PUT /api/topics/:id (auth required, author or staff)
    // -------------------------------------------------------------------

    app.put(
      '/api/topics/:id',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Update a topic',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(updateTopicSchema, request.body, 'Invalid update data')
        const topic = await topicService.update(id, user, {
          ...(body.title === undefined ? {} : { title: body.title }),
          ...(body.categoryName === undefined ? {} : { categoryName: body.categoryName }),
          ...(body.autoCloseDays === undefined ? {} : { autoCloseDays: body.autoCloseDays }),
        })

        return reply.status(200).send({
          id: topic.id,
          title: topic.title,
          slug: topic.slug,
          categoryId: topic.categoryId,
          autoCloseAt: topic.autoCloseAt?.toISOString() ?? null,
        })
      }
    )

    // -------------------------------------------------------------------
    // DELETE /api/topics/:id and POST /api/topics/:id/recover (staff)
    // -------------------------------------------------------------------

    app.delete(
      '/api/topics/:id',
      {
        preHandler: [authMiddleware.requireStaff],
        schema: {
          tags: ['Topics'],
          summary: 'Trash a topic (staff)',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        await topicService.trash(id, user)
        return reply.status(204).send()
      }
    )

    app.post(
      '/api/topics/:id/recover',
      {
        preHandler: [authMiddleware.requireStaff],
        schema: {
          tags: ['Topics'],
          summary: 'Recover a trashed topic (staff)',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        await topicService.recover(id, user)
        return reply.status(204).send()
      }
    )

    // -------------------------------------------------------------------
    // POST /api/topics/:id/posts (auth required)
    // -------------------------------------------------------------------

    app.post(
      '/api/topics/:id/posts',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Posts'],
          summary: 'Reply to a topic',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(createPostSchema, request.body, 'Invalid post data')
        const post = await topicService.createPost(id, user, {
          raw: body.raw,
          replyToPostNumber: body.replyToPostNumber ?? null,
        })

        return reply.status(201).send({
          id: post.id,
          topicId: post.topicId,
          postNumber: post.postNumber,
          createdAt: post.createdAt.toISOString(),
        })
      }
    )

    // -------------------------------------------------------------------
    // PUT /api/topics/:id/status (staff)
    // -------------------------------------------------------------------

    app.put(
      '/api/topics/:id/status',
      {
        preHandler: [authMiddleware.requireStaff],
        schema: {
          tags: ['Moderation'],
          summary: 'Change a topic status flag (staff)',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(updateStatusSchema, request.body, 'Invalid status update')
        const { topic, post } = await topicService.updateStatus(id, body.status, body.enabled, user)

        return reply.status(200).send({
          id: topic.id,
          closed: topic.closed,
          archived: topic.archived,
          visible: topic.visible,
          pinned: topic.pinnedAt !== null,
          moderatorPostNumber: post.postNumber,
        })
      }
    )

    // -------------------------------------------------------------------
    // POST /api/topics/:id/move-posts (staff)
    // -------------------------------------------------------------------

    app.post(
      '/api/topics/:id/move-posts',
      {
        preHandler: [authMiddleware.requireStaff],
        schema: {
          tags: ['Moderation'],
          summary: 'Move posts to a new or existing topic (staff)',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(movePostsSchema, request.body, 'Invalid move request')
        const result = await topicService.movePosts(user, id, body.postIds, toDestination(body))

        return reply.status(200).send({
          destinationTopicId: result.destination.id,
          destinationSlug: result.destination.slug,
          firstMovedPostNumber: result.firstMovedPostNumber,
          movedPostIds: result.movedPostIds,
        })
      }
    )

    // -------------------------------------------------------------------
    // POST /api/topics/:id/invite (auth required)
    // -------------------------------------------------------------------

    app.post(
      '/api/topics/:id/invite',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Invite a user or email address',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(inviteSchema, request.body, 'Invalid invite')
        const result = await topicService.invite(id, user, body.identifier)

        if (result.outcome === 'invited') {
          return reply.status(200).send({
            outcome: result.outcome,
            inviteId: result.invite.id,
            reused: result.reused,
          })
        }
        return reply.status(200).send({ outcome: result.outcome, userId: result.userId })
      }
    )

    // -------------------------------------------------------------------
    // Per-user state (auth required)
    // -------------------------------------------------------------------

    app.put(
      '/api/topics/:id/star',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Star or unstar a topic',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(starSchema, request.body ?? {}, 'Invalid star request')
        const result = await topicService.toggleStar(id, user, body.starred)
        return reply.status(200).send(result)
      }
    )

    app.put(
      '/api/topics/:id/mute',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Toggle mute on a topic',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const level = await topicService.toggleMute(id, user)
        return reply.status(200).send({ notificationLevel: level })
      }
    )

    app.put(
      '/api/topics/:id/notification-level',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Set the notification level for a topic',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const body = parseInput(notificationLevelSchema, request.body, 'Invalid notification level')
        const level = NOTIFICATION_LEVELS[body.level]
        await topicService.setNotificationLevel(id, user, level)
        return reply.status(200).send({ notificationLevel: level })
      }
    )

    app.put(
      '/api/topics/:id/clear-pin',
      {
        preHandler: [authMiddleware.requireAuth],
        schema: {
          tags: ['Topics'],
          summary: 'Stop showing the pin to the caller',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const user = authenticatedUser(request)

        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        await topicService.clearPin(id, user)
        return reply.status(204).send()
      }
    )

    // -------------------------------------------------------------------
    // POST /api/topics/:id/recalculate (staff)
    // -------------------------------------------------------------------

    app.post(
      '/api/topics/:id/recalculate',
      {
        preHandler: [authMiddleware.requireStaff],
        schema: {
          tags: ['Moderation'],
          summary: 'Recount topic statistics (staff)',
          security: [{ bearerAuth: [] }],
          params: idParamsJsonSchema,
        },
      },
      async (request, reply) => {
        const { id } = parseInput(topicIdParamsSchema, request.params, 'Invalid topic id')
        const stats = await topicService.recalculateStatistics(id)
        return reply.status(200).send(stats)
      }
    )

    done()
  }
}
