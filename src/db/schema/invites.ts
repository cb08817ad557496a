import { pgTable, serial, text, integer, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core'

export const invites = pgTable(
  'invites',
  {
    id: serial('id').primaryKey(),
    inviteKey: text('invite_key').notNull(),
    invitedById: integer('invited_by_id').notNull(),
    /** Stored lower-cased. */
    email: text('email').notNull(),
    redeemedAt: timestamp('redeemed_at', { withTimezone: true }),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('invites_invited_by_email_idx').on(table.invitedById, table.email),
    uniqueIndex('invites_invite_key_idx').on(table.inviteKey),
    index('invites_email_idx').on(table.email),
  ]
)

export type Invite = typeof invites.$inferSelect
