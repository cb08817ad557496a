import {
  pgTable,
  serial,
  text,
  integer,
  timestamp,
  boolean,
  index,
  foreignKey,
} from 'drizzle-orm/pg-core'
import { categories } from './categories.js'

export const topics = pgTable(
  'topics',
  {
    id: serial('id').primaryKey(),
    title: text('title').notNull(),
    slug: text('slug').notNull(),
    categoryId: integer('category_id'),
    userId: integer('user_id').notNull(),
    lastPostUserId: integer('last_post_user_id').notNull(),
    lastPostedAt: timestamp('last_posted_at', { withTimezone: true }),
    /** Never reused: allocation takes the greater of this and the stored maximum. */
    highestPostNumber: integer('highest_post_number').notNull().default(0),
    postsCount: integer('posts_count').notNull().default(0),
    replyCount: integer('reply_count').notNull().default(0),
    featuredUser1Id: integer('featured_user1_id'),
    featuredUser2Id: integer('featured_user2_id'),
    featuredUser3Id: integer('featured_user3_id'),
    featuredUser4Id: integer('featured_user4_id'),
    avgTime: integer('avg_time'),
    views: integer('views').notNull().default(0),
    likeCount: integer('like_count').notNull().default(0),
    offTopicCount: integer('off_topic_count').notNull().default(0),
    bookmarkCount: integer('bookmark_count').notNull().default(0),
    spamCount: integer('spam_count').notNull().default(0),
    illegalCount: integer('illegal_count').notNull().default(0),
    inappropriateCount: integer('inappropriate_count').notNull().default(0),
    notifyModeratorsCount: integer('notify_moderators_count').notNull().default(0),
    notifyUserCount: integer('notify_user_count').notNull().default(0),
    voteCount: integer('vote_count').notNull().default(0),
    starCount: integer('star_count').notNull().default(0),
    moderatorPostsCount: integer('moderator_posts_count').notNull().default(0),
    visible: boolean('visible').notNull().default(true),
    closed: boolean('closed').notNull().default(false),
    archived: boolean('archived').notNull().default(false),
    pinnedAt: timestamp('pinned_at', { withTimezone: true }),
    bumpedAt: timestamp('bumped_at', { withTimezone: true }).notNull().defaultNow(),
    archetype: text('archetype', { enum: ['regular', 'private_message'] })
      .notNull()
      .default('regular'),
    autoCloseAt: timestamp('auto_close_at', { withTimezone: true }),
    autoCloseUserId: integer('auto_close_user_id'),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('topics_user_id_deleted_at_idx').on(table.userId, table.deletedAt),
    index('topics_bumped_at_idx').on(table.bumpedAt),
    index('topics_category_id_idx').on(table.categoryId),
    index('topics_archetype_idx').on(table.archetype),
    foreignKey({
      columns: [table.categoryId],
      foreignColumns: [categories.id],
      name: 'topics_category_id_fk',
    }).onDelete('set null'),
  ]
)

export type Topic = typeof topics.$inferSelect
export type TopicArchetype = Topic['archetype']
