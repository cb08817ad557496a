import { pgTable, serial, text, timestamp, boolean, uniqueIndex, index } from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'

/**
 * Accounts are owned by the account service. This service reads them to
 * resolve invitees and to decide staff privileges; it never writes them.
 */
export const users = pgTable(
  'users',
  {
    id: serial('id').primaryKey(),
    username: text('username').notNull(),
    /** Stored lower-cased. */
    email: text('email').notNull(),
    admin: boolean('admin').notNull().default(false),
    moderator: boolean('moderator').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('users_username_lower_idx').on(sql`lower(${table.username})`),
    uniqueIndex('users_email_idx').on(table.email),
    index('users_staff_idx')
      .on(table.admin, table.moderator)
      .where(sql`admin OR moderator`),
  ]
)
