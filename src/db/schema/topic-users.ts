import {
  pgTable,
  integer,
  boolean,
  timestamp,
  primaryKey,
  index,
  foreignKey,
} from 'drizzle-orm/pg-core'
import { topics } from './topics.js'
import { users } from './users.js'

export const topicUsers = pgTable(
  'topic_users',
  {
    topicId: integer('topic_id').notNull(),
    userId: integer('user_id').notNull(),
    /** See NOTIFICATION_LEVELS in services/topic-state.ts. */
    notificationLevel: integer('notification_level').notNull().default(1),
    notificationsReasonId: integer('notifications_reason_id'),
    starred: boolean('starred').notNull().default(false),
    starredAt: timestamp('starred_at', { withTimezone: true }),
    unstarredAt: timestamp('unstarred_at', { withTimezone: true }),
    clearedPinnedAt: timestamp('cleared_pinned_at', { withTimezone: true }),
    lastReadPostNumber: integer('last_read_post_number'),
    seenPostCount: integer('seen_post_count'),
  },
  (table) => [
    primaryKey({ columns: [table.topicId, table.userId], name: 'topic_users_pk' }),
    index('topic_users_user_id_idx').on(table.userId),
    index('topic_users_starred_idx').on(table.topicId, table.starred),
    foreignKey({
      columns: [table.topicId],
      foreignColumns: [topics.id],
      name: 'topic_users_topic_id_fk',
    }).onDelete('cascade'),
    foreignKey({
      columns: [table.userId],
      foreignColumns: [users.id],
      name: 'topic_users_user_id_fk',
    }).onDelete('cascade'),
  ]
)

export type TopicUser = typeof topicUsers.$inferSelect
