import {
  pgTable,
  serial,
  text,
  integer,
  timestamp,
  index,
  uniqueIndex,
  foreignKey,
} from 'drizzle-orm/pg-core'
import { topics } from './topics.js'

export const posts = pgTable(
  'posts',
  {
    id: serial('id').primaryKey(),
    topicId: integer('topic_id').notNull(),
    userId: integer('user_id').notNull(),
    postNumber: integer('post_number').notNull(),
    /** Display order; differs from postNumber once a post is re-anchored mid-stream. */
    sortOrder: integer('sort_order').notNull(),
    raw: text('raw').notNull(),
    postType: text('post_type', { enum: ['regular', 'moderator_action'] })
      .notNull()
      .default('regular'),
    replyToPostNumber: integer('reply_to_post_number'),
    /** Average reading time in seconds, maintained by the reading tracker. */
    avgTime: integer('avg_time'),
    likeCount: integer('like_count').notNull().default(0),
    offTopicCount: integer('off_topic_count').notNull().default(0),
    bookmarkCount: integer('bookmark_count').notNull().default(0),
    spamCount: integer('spam_count').notNull().default(0),
    illegalCount: integer('illegal_count').notNull().default(0),
    inappropriateCount: integer('inappropriate_count').notNull().default(0),
    notifyModeratorsCount: integer('notify_moderators_count').notNull().default(0),
    notifyUserCount: integer('notify_user_count').notNull().default(0),
    voteCount: integer('vote_count').notNull().default(0),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('posts_topic_id_post_number_idx').on(table.topicId, table.postNumber),
    index('posts_user_id_idx').on(table.userId),
    index('posts_topic_id_created_at_idx').on(table.topicId, table.createdAt),
    foreignKey({
      columns: [table.topicId],
      foreignColumns: [topics.id],
      name: 'posts_topic_id_fk',
    }).onDelete('cascade'),
  ]
)

export type Post = typeof posts.$inferSelect
export type PostType = Post['postType']
