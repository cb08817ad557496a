import { pgTable, serial, integer, timestamp, uniqueIndex, foreignKey } from 'drizzle-orm/pg-core'
import { categories } from './categories.js'
import { topics } from './topics.js'

export const categoryFeaturedTopics = pgTable(
  'category_featured_topics',
  {
    id: serial('id').primaryKey(),
    categoryId: integer('category_id').notNull(),
    topicId: integer('topic_id').notNull(),
    rank: integer('rank').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('category_featured_topics_category_topic_idx').on(table.categoryId, table.topicId),
    foreignKey({
      columns: [table.categoryId],
      foreignColumns: [categories.id],
      name: 'category_featured_topics_category_id_fk',
    }).onDelete('cascade'),
    foreignKey({
      columns: [table.topicId],
      foreignColumns: [topics.id],
      name: 'category_featured_topics_topic_id_fk',
    }).onDelete('cascade'),
  ]
)
