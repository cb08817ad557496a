import { pgTable, serial, text, integer, boolean, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core'

export const categories = pgTable(
  'categories',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    slug: text('slug').notNull(),
    /**
     * The topic that describes the category itself. A topic referenced here
     * never goes through the creation-path category assignment.
     */
    topicId: integer('topic_id'),
    topicCount: integer('topic_count').notNull().default(0),
    /** Default auto-close for new topics, in days. */
    autoCloseDays: integer('auto_close_days'),
    secure: boolean('secure').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('categories_name_idx').on(table.name),
    uniqueIndex('categories_slug_idx').on(table.slug),
    index('categories_topic_id_idx').on(table.topicId),
  ]
)
