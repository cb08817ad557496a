import { pgTable, serial, integer, timestamp, uniqueIndex, foreignKey } from 'drizzle-orm/pg-core'
import { topics } from './topics.js'
import { users } from './users.js'

export const topicAllowedUsers = pgTable(
  'topic_allowed_users',
  {
    id: serial('id').primaryKey(),
    topicId: integer('topic_id').notNull(),
    userId: integer('user_id').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('topic_allowed_users_topic_user_idx').on(table.topicId, table.userId),
    foreignKey({
      columns: [table.topicId],
      foreignColumns: [topics.id],
      name: 'topic_allowed_users_topic_id_fk',
    }).onDelete('cascade'),
    foreignKey({
      columns: [table.userId],
      foreignColumns: [users.id],
      name: 'topic_allowed_users_user_id_fk',
    }).onDelete('cascade'),
  ]
)
