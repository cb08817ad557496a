import { z } from 'zod/v4'
import { TOPIC_STATUS_PROPERTIES } from '../services/topic-status.js'

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

const positiveId = z.coerce.number().int().positive()

// Fine-grained title limits are forum policy, checked by the topic creator
const titleSchema = z.string().trim().min(1, 'Title is required').max(1000, 'Title is too long')

const rawSchema = z
  .string()
  .min(1, 'Content is required')
  .max(100000, 'Content must be at most 100,000 characters')

const autoCloseDaysSchema = z.number().int().min(0).max(36500).nullable()

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

export const topicIdParamsSchema = z.object({
  id: positiveId,
})

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

/** Schema for creating a new topic or private message. */
export const createTopicSchema = z.object({
  title: titleSchema,
  raw: rawSchema.optional(),
  archetype: z.enum(['regular', 'private_message']).optional(),
  categoryId: positiveId.nullable().optional(),
  autoCloseDays: autoCloseDaysSchema.optional(),
})

export type CreateTopicBody = z.infer<typeof createTopicSchema>

/** Schema for updating an existing topic (at least one field). */
export const updateTopicSchema = z
  .object({
    title: titleSchema.optional(),
    categoryName: z.string().trim().max(255).nullable().optional(),
    autoCloseDays: autoCloseDaysSchema.optional(),
  })
  .refine(
    (body) =>
      body.title !== undefined || body.categoryName !== undefined || body.autoCloseDays !== undefined,
    { message: 'Nothing to update' }
  )

export type UpdateTopicBody = z.infer<typeof updateTopicSchema>

export const createPostSchema = z.object({
  raw: rawSchema,
  replyToPostNumber: z.number().int().positive().nullable().optional(),
})

export const updateStatusSchema = z.object({
  status: z.enum(TOPIC_STATUS_PROPERTIES),
  enabled: z.boolean(),
})

/** Exactly one destination: a new topic title or an existing topic id. */
export const movePostsSchema = z
  .object({
    postIds: z.array(z.number().int().positive()).min(1, 'Select at least one post').max(1000),
    title: titleSchema.optional(),
    destinationTopicId: z.number().int().positive().optional(),
  })
  .refine((body) => (body.title === undefined) !== (body.destinationTopicId === undefined), {
    message: 'Provide either a title or a destinationTopicId',
  })

export type MovePostsBody = z.infer<typeof movePostsSchema>

export const inviteSchema = z.object({
  identifier: z.string().trim().min(1, 'Username or email is required').max(254),
})

export const starSchema = z.object({
  starred: z.boolean().optional(),
})

export const notificationLevelSchema = z.object({
  level: z.enum(['muted', 'regular', 'tracking', 'watching']),
})
