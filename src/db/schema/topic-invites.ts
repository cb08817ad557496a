import { pgTable, serial, integer, timestamp, uniqueIndex, foreignKey } from 'drizzle-orm/pg-core'
import { topics } from './topics.js'
import { invites } from './invites.js'

export const topicInvites = pgTable(
  'topic_invites',
  {
    id: serial('id').primaryKey(),
    topicId: integer('topic_id').notNull(),
    inviteId: integer('invite_id').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('topic_invites_topic_invite_idx').on(table.topicId, table.inviteId),
    foreignKey({
      columns: [table.topicId],
      foreignColumns: [topics.id],
      name: 'topic_invites_topic_id_fk',
    }).onDelete('cascade'),
    foreignKey({
      columns: [table.inviteId],
      foreignColumns: [invites.id],
      name: 'topic_invites_invite_id_fk',
    }).onDelete('cascade'),
  ]
)
