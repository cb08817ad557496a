import { and, asc, count, eq, inArray, isNull, min, ne, notInArray } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { posts } from '../db/schema/posts.js'
import { users } from '../db/schema/users.js'
import type { Logger } from '../lib/logger.js'
import { notFound } from '../lib/api-errors.js'
import { translate } from '../lib/messages.js'

export const FEATURED_USER_SLOTS = 4
export const MAX_SUMMARY_ENTRIES = 5

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PosterRole = 'original_poster' | 'most_posts' | 'frequent_poster' | 'most_recent_poster'

export interface AuthorPostCount {
  userId: number
  postCount: number
  firstPostNumber: number
}

export interface FeaturedSlots {
  featuredUser1Id: number | null
  featuredUser2Id: number | null
  featuredUser3Id: number | null
  featuredUser4Id: number | null
}

export interface PosterSource extends FeaturedSlots {
  userId: number
  lastPostUserId: number
}

export interface PosterUser {
  id: number
  username: string
}

export interface PosterSummaryEntry {
  user: PosterUser
  roles: PosterRole[]
  description: string
  latest: boolean
}

export interface SelectFeaturedOptions {
  exceptPostId?: number
}

export interface PosterSelector {
  /** Rank and persist featured slots; returns the ranked user ids. */
  featureTopicUsers(topicId: number, options?: SelectFeaturedOptions, executor?: Executor): Promise<number[]>
  selectFeatured(topicId: number, options?: SelectFeaturedOptions): Promise<PosterSummaryEntry[]>
  invalidate(topicId: number): void
}

// ---------------------------------------------------------------------------
// Ranking and summary
// ---------------------------------------------------------------------------

/** Most posts first; ties go to whoever posted earlier, then to the lower id. */
export function rankFeaturedUsers(
  rows: AuthorPostCount[],
  limit: number = FEATURED_USER_SLOTS
): number[] {
  return [...rows]
    .sort(
      (a, b) =>
        b.postCount - a.postCount || a.firstPostNumber - b.firstPostNumber || a.userId - b.userId
    )
    .slice(0, limit)
    .map((row) => row.userId)
}

export function toFeaturedSlots(userIds: number[]): FeaturedSlots {
  return {
    featuredUser1Id: userIds[0] ?? null,
    featuredUser2Id: userIds[1] ?? null,
    featuredUser3Id: userIds[2] ?? null,
    featuredUser4Id: userIds[3] ?? null,
  }
}

/**
 * Build the poster strip for a topic from its persisted slots. Users missing
 * from `usersById` are dropped. The last poster always comes last.
 */
export function buildPostersSummary(
  source: PosterSource,
  usersById: ReadonlyMap<number, PosterUser>
): PosterSummaryEntry[] {
  const roles = new Map<number, PosterRole[]>()
  const addRole = (userId: number | null, role: PosterRole): void => {
    if (userId === null || !usersById.has(userId)) return
    const existing = roles.get(userId)
    if (existing) {
      existing.push(role)
    } else {
      roles.set(userId, [role])
    }
  }

  addRole(source.userId, 'original_poster')
  addRole(source.featuredUser1Id, 'most_posts')
  addRole(source.featuredUser2Id, 'frequent_poster')
  addRole(source.featuredUser3Id, 'frequent_poster')
  addRole(source.featuredUser4Id, 'frequent_poster')
  addRole(source.lastPostUserId, 'most_recent_poster')

  const candidates = [
    source.userId,
    source.lastPostUserId,
    source.featuredUser1Id,
    source.featuredUser2Id,
    source.featuredUser3Id,
    source.featuredUser4Id,
  ]
  const ordered: number[] = []
  for (const userId of candidates) {
    if (userId === null || !usersById.has(userId) || ordered.includes(userId)) continue
    ordered.push(userId)
  }
  const capped = ordered.slice(0, MAX_SUMMARY_ENTRIES)

  const lastIndex = capped.indexOf(source.lastPostUserId)
  if (lastIndex !== -1) {
    capped.splice(lastIndex, 1)
    capped.push(source.lastPostUserId)
  }

  const entries: PosterSummaryEntry[] = []
  for (const userId of capped) {
    const user = usersById.get(userId)
    if (!user) continue
    const userRoles = roles.get(userId) ?? []
    entries.push({
      user,
      roles: userRoles,
      description: userRoles.map((role) => translate(`poster.${role}`)).join(', '),
      latest: userId === source.lastPostUserId,
    })
  }
  return entries
}

// ---------------------------------------------------------------------------
// Summary cache
// ---------------------------------------------------------------------------

export const DEFAULT_SUMMARY_CACHE_SIZE = 1000

/** True when both sources name the same posters in the same slots. */
export function samePosters(a: PosterSource, b: PosterSource): boolean {
  return (
    a.userId === b.userId &&
    a.lastPostUserId === b.lastPostUserId &&
    a.featuredUser1Id === b.featuredUser1Id &&
    a.featuredUser2Id === b.featuredUser2Id &&
    a.featuredUser3Id === b.featuredUser3Id &&
    a.featuredUser4Id === b.featuredUser4Id
  )
}

interface CachedSummary {
  source: PosterSource
  summary: PosterSummaryEntry[]
}

/**
 * In-process summary cache. An entry is served only while the topic's
 * posters match the ones it was built from, so slots rewritten by another
 * process are picked up on the next read. Least recently used entries are
 * evicted past `maxEntries`.
 */
export class PosterSummaryCache {
  private readonly entries = new Map<number, CachedSummary>()

  constructor(private readonly maxEntries: number = DEFAULT_SUMMARY_CACHE_SIZE) {}

  get size(): number {
    return this.entries.size
  }

  get(topicId: number, source: PosterSource): PosterSummaryEntry[] | undefined {
    const entry = this.entries.get(topicId)
    if (!entry) return undefined

    this.entries.delete(topicId)
    if (!samePosters(entry.source, source)) return undefined

    this.entries.set(topicId, entry)
    return entry.summary
  }

  set(topicId: number, source: PosterSource, summary: PosterSummaryEntry[]): void {
    this.entries.delete(topicId)
    this.entries.set(topicId, { source: { ...source }, summary })

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }

  invalidate(topicId: number): void {
    this.entries.delete(topicId)
  }

  clear(): void {
    this.entries.clear()
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPosterSelector(
  db: Executor,
  logger: Logger,
  cache: PosterSummaryCache = new PosterSummaryCache()
): PosterSelector {
  async function persistFeatured(
    executor: Executor,
    topicId: number,
    options: SelectFeaturedOptions
  ): Promise<{ ranked: number[]; source: PosterSource }> {
    const topicRows = await executor
      .select({ userId: topics.userId, lastPostUserId: topics.lastPostUserId })
      .from(topics)
      .where(eq(topics.id, topicId))
      .limit(1)
    const topic = topicRows[0]
    if (!topic) {
      throw notFound(`Topic ${String(topicId)} not found`)
    }

    const rows = await executor
      .select({
        userId: posts.userId,
        postCount: count(),
        firstPostNumber: min(posts.postNumber),
      })
      .from(posts)
      .where(
        and(
          eq(posts.topicId, topicId),
          isNull(posts.deletedAt),
          notInArray(posts.userId, [topic.userId, topic.lastPostUserId]),
          options.exceptPostId === undefined ? undefined : ne(posts.id, options.exceptPostId)
        )
      )
      .groupBy(posts.userId)
      .orderBy(asc(posts.userId))

    const ranked = rankFeaturedUsers(
      rows.map((row) => ({
        userId: row.userId,
        postCount: row.postCount,
        firstPostNumber: row.firstPostNumber ?? 0,
      }))
    )
    const slots = toFeaturedSlots(ranked)

    await executor.update(topics).set(slots).where(eq(topics.id, topicId))

    return { ranked, source: { ...topic, ...slots } }
  }

  return {
    async featureTopicUsers(topicId, options = {}, executor = db) {
      const { ranked } = await persistFeatured(executor, topicId, options)
      return ranked
    },

    async selectFeatured(topicId, options = {}) {
      const { source } = await persistFeatured(db, topicId, options)

      // A summary that skips a post is one-off, never shared
      const cacheable = options.exceptPostId === undefined
      const cached = cacheable ? cache.get(topicId, source) : undefined
      if (cached) return cached

      const ids = [
        source.userId,
        source.lastPostUserId,
        source.featuredUser1Id,
        source.featuredUser2Id,
        source.featuredUser3Id,
        source.featuredUser4Id,
      ].filter((id): id is number => id !== null)

      const userRows = await db
        .select({ id: users.id, username: users.username })
        .from(users)
        .where(inArray(users.id, [...new Set(ids)]))
      const usersById = new Map(userRows.map((user) => [user.id, user]))

      const summary = buildPostersSummary(source, usersById)
      if (cacheable) {
        cache.set(topicId, source, summary)
      }
      logger.debug({ topicId, posters: summary.length }, 'Built poster summary')
      return summary
    },

    invalidate(topicId: number) {
      cache.invalidate(topicId)
    },
  }
}
