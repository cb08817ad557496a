import { describe, it, expect, beforeEach } from 'vitest'
import { PgDialect } from 'drizzle-orm/pg-core'
import { createGuardian, isStaff } from '../../../src/auth/guardian.js'
import { createMockDb, queueResults, resetDbMocks } from '../../helpers/mock-db.js'
import { buildTopic, buildUser } from '../../helpers/fixtures.js'

const dialect = new PgDialect()

describe('isStaff', () => {
  it('accepts admins and moderators only', () => {
    expect(isStaff(buildUser({ admin: true }))).toBe(true)
    expect(isStaff(buildUser({ moderator: true }))).toBe(true)
    expect(isStaff(buildUser())).toBe(false)
    expect(isStaff(undefined)).toBe(false)
  })
})

describe('createGuardian', () => {
  const mockDb = createMockDb()
  const member = buildUser({ id: 2 })
  const privateTopic = buildTopic({ id: 7, archetype: 'private_message' })

  beforeEach(() => {
    resetDbMocks(mockDb)
  })

  function build() {
    return createGuardian(mockDb as never)
  }

  describe('canSee', () => {
    it('lets staff see deleted and private topics', async () => {
      const moderator = buildUser({ moderator: true })

      expect(await build().canSee(moderator, buildTopic({ deletedAt: new Date() }))).toBe(true)
      expect(await build().canSee(moderator, privateTopic)).toBe(true)
      expect(mockDb.select).not.toHaveBeenCalled()
    })

    it('hides deleted topics from everyone else', async () => {
      expect(await build().canSee(member, buildTopic({ deletedAt: new Date() }))).toBe(false)
    })

    it('shows regular topics to anonymous viewers', async () => {
      expect(await build().canSee(undefined, buildTopic())).toBe(true)
    })

    it('hides private messages from anonymous viewers', async () => {
      expect(await build().canSee(undefined, privateTopic)).toBe(false)
      expect(mockDb.select).not.toHaveBeenCalled()
    })

    it('shows private messages to allowed users only', async () => {
      queueResults(mockDb.select, [[{ id: 1 }], []])
      const guardian = build()

      expect(await guardian.canSee(member, privateTopic)).toBe(true)
      expect(await guardian.canSee(buildUser({ id: 3 }), privateTopic)).toBe(false)
    })
  })

  describe('user lookups', () => {
    it('finds a user by id', async () => {
      queueResults(mockDb.select, [[member]])

      expect(await build().findUser(2)).toBe(member)
    })

    it('matches emails lower-cased', async () => {
      const [chain] = queueResults(mockDb.select, [[]])

      await build().findUserByEmail(' Bob@Example.com ')

      const query = dialect.sqlToQuery(chain?.where.mock.calls[0]?.[0])
      expect(query.sql).toBe('"users"."email" = $1')
      expect(query.params).toEqual(['bob@example.com'])
    })

    it('skips the lookup for a blank identifier', async () => {
      expect(await build().findUserByUsernameOrEmail('   ')).toBeUndefined()
      expect(mockDb.select).not.toHaveBeenCalled()
    })

    it('matches usernames case-insensitively', async () => {
      const [chain] = queueResults(mockDb.select, [[member]])

      expect(await build().findUserByUsernameOrEmail('BOB')).toBe(member)
      expect(dialect.sqlToQuery(chain?.where.mock.calls[0]?.[0]).params).toEqual(['bob', 'bob'])
    })
  })
})
