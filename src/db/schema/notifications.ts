import { pgTable, serial, text, integer, boolean, timestamp, jsonb, index } from 'drizzle-orm/pg-core'

export const notifications = pgTable(
  'notifications',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull(),
    type: text('type', {
      enum: ['invited_to_private_message', 'moved_post'],
    }).notNull(),
    topicId: integer('topic_id').notNull(),
    postNumber: integer('post_number').notNull(),
    data: jsonb('data').$type<Record<string, string | number>>().notNull(),
    read: boolean('read').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('notifications_user_id_idx').on(table.userId),
    index('notifications_user_read_idx').on(table.userId, table.read),
    index('notifications_created_at_idx').on(table.createdAt),
  ]
)

export type NotificationType = (typeof notifications.$inferInsert)['type']
