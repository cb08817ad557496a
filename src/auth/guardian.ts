import { and, eq, or, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { users } from '../db/schema/users.js'
import { topicAllowedUsers } from '../db/schema/topic-allowed-users.js'
import type { Topic } from '../db/schema/topics.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ActingUser {
  id: number
  username: string
  admin: boolean
  moderator: boolean
}

/** Identity lookups and visibility rules the topic services depend on. */
export interface Guardian {
  findUser(id: number): Promise<ActingUser | undefined>
  /** Case-insensitive match on username, or on the lower-cased email. */
  findUserByUsernameOrEmail(identifier: string): Promise<ActingUser | undefined>
  findUserByEmail(email: string): Promise<ActingUser | undefined>
  isStaff(user: ActingUser | undefined): boolean
  canSee(user: ActingUser | undefined, topic: Pick<Topic, 'id' | 'archetype' | 'deletedAt'>): Promise<boolean>
}

const userColumns = {
  id: users.id,
  username: users.username,
  admin: users.admin,
  moderator: users.moderator,
}

export function isStaff(user: ActingUser | undefined): boolean {
  return user !== undefined && (user.admin || user.moderator)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createGuardian(db: Executor): Guardian {
  async function firstUser(where: ReturnType<typeof eq>): Promise<ActingUser | undefined> {
    const rows = await db.select(userColumns).from(users).where(where).limit(1)
    return rows[0]
  }

  return {
    findUser(id: number) {
      return firstUser(eq(users.id, id))
    },

    async findUserByUsernameOrEmail(identifier: string) {
      const normalized = identifier.trim().toLowerCase()
      if (normalized === '') return undefined
      const rows = await db
        .select(userColumns)
        .from(users)
        .where(or(sql`lower(${users.username}) = ${normalized}`, eq(users.email, normalized)))
        .limit(1)
      return rows[0]
    },

    findUserByEmail(email: string) {
      return firstUser(eq(users.email, email.trim().toLowerCase()))
    },

    isStaff,

    async canSee(user, topic) {
      if (isStaff(user)) return true
      if (topic.deletedAt !== null) return false
      if (topic.archetype !== 'private_message') return true
      if (!user) return false

      const allowed = await db
        .select({ id: topicAllowedUsers.id })
        .from(topicAllowedUsers)
        .where(and(eq(topicAllowedUsers.topicId, topic.id), eq(topicAllowedUsers.userId, user.id)))
        .limit(1)
      return allowed.length > 0
    },
  }
}
