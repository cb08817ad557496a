import { and, desc, eq, isNull, sql } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import { categories } from '../db/schema/categories.js'
import { categoryFeaturedTopics } from '../db/schema/category-featured-topics.js'
import type { Logger } from '../lib/logger.js'
import { invalidArgument, notFound } from '../lib/api-errors.js'
import { runInTransaction } from '../lib/transaction.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CategoryTransitionPlan {
  nextCategoryId: number | null
  decrementCategoryId: number | null
  incrementCategoryId: number | null
  /** Categories whose featured topics must be rebuilt, in order. */
  refreshCategoryIds: number[]
}

export interface CategoryChangeResult {
  changed: boolean
  categoryId: number | null
}

export interface CategoryTransitionManager {
  /** Creation-path assignment. Returns false when skipped. */
  changedToCategory(tx: Executor, topicId: number, categoryId: number | null): Promise<boolean>
  /** Explicit change by name; a blank name clears the category. */
  changeCategory(topicId: number, name: string | null): Promise<CategoryChangeResult>
  featureTopicsFor(categoryId: number, executor?: Executor): Promise<number[]>
}

/**
 * Work out the counter and projection updates for moving a topic from one
 * category to another. Null means nothing to do.
 */
export function planCategoryTransition(
  currentCategoryId: number | null,
  nextCategoryId: number | null
): CategoryTransitionPlan | null {
  if (currentCategoryId === nextCategoryId) return null

  const refreshCategoryIds: number[] = []
  if (currentCategoryId !== null) refreshCategoryIds.push(currentCategoryId)
  if (nextCategoryId !== null) refreshCategoryIds.push(nextCategoryId)

  return {
    nextCategoryId,
    decrementCategoryId: currentCategoryId,
    incrementCategoryId: nextCategoryId,
    refreshCategoryIds,
  }
}

// ---------------------------------------------------------------------------
// Transaction-scoped helpers
// ---------------------------------------------------------------------------

/**
 * Rebuild a category's featured-topic projection: pinned topics first, then
 * most recently bumped.
 */
export async function featureTopicsInCategory(
  tx: Executor,
  categoryId: number,
  limit: number
): Promise<number[]> {
  const rows = await tx
    .select({ id: topics.id })
    .from(topics)
    .where(
      and(
        eq(topics.categoryId, categoryId),
        eq(topics.visible, true),
        eq(topics.archetype, 'regular'),
        isNull(topics.deletedAt)
      )
    )
    .orderBy(sql`${topics.pinnedAt} DESC NULLS LAST`, desc(topics.bumpedAt))
    .limit(limit)

  await tx.delete(categoryFeaturedTopics).where(eq(categoryFeaturedTopics.categoryId, categoryId))

  if (rows.length > 0) {
    await tx.insert(categoryFeaturedTopics).values(
      rows.map((row, index) => ({
        categoryId,
        topicId: row.id,
        rank: index + 1,
      }))
    )
  }

  return rows.map((row) => row.id)
}

export async function applyCategoryTransition(
  tx: Executor,
  topicId: number,
  plan: CategoryTransitionPlan,
  featuredLimit: number
): Promise<void> {
  await tx
    .update(topics)
    .set({ categoryId: plan.nextCategoryId, updatedAt: new Date() })
    .where(eq(topics.id, topicId))

  if (plan.decrementCategoryId !== null) {
    await tx
      .update(categories)
      .set({ topicCount: sql`GREATEST(${categories.topicCount} - 1, 0)` })
      .where(eq(categories.id, plan.decrementCategoryId))
  }
  if (plan.incrementCategoryId !== null) {
    await tx
      .update(categories)
      .set({ topicCount: sql`${categories.topicCount} + 1` })
      .where(eq(categories.id, plan.incrementCategoryId))
  }

  for (const categoryId of plan.refreshCategoryIds) {
    await featureTopicsInCategory(tx, categoryId, featuredLimit)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCategoryTransitionManager(
  db: Executor,
  logger: Logger,
  featuredLimit: number
): CategoryTransitionManager {
  return {
    async changedToCategory(tx, topicId, categoryId) {
      if (categoryId === null) return false

      // A category's own definition topic does not count towards it
      const marker = await tx
        .select({ id: categories.id })
        .from(categories)
        .where(eq(categories.topicId, topicId))
        .limit(1)
      if (marker.length > 0) return false

      const plan = planCategoryTransition(null, categoryId)
      if (!plan) return false
      await applyCategoryTransition(tx, topicId, plan, featuredLimit)
      return true
    },

    async changeCategory(topicId, name) {
      const trimmed = name?.trim() ?? ''

      const result = await runInTransaction(db, async (tx) => {
        const topicRows = await tx
          .select({ id: topics.id, categoryId: topics.categoryId })
          .from(topics)
          .where(eq(topics.id, topicId))
          .for('update')
        const topic = topicRows[0]
        if (!topic) {
          throw notFound(`Topic ${String(topicId)} not found`)
        }

        let nextCategoryId: number | null = null
        if (trimmed !== '') {
          const categoryRows = await tx
            .select({ id: categories.id })
            .from(categories)
            .where(eq(categories.name, trimmed))
            .limit(1)
          const category = categoryRows[0]
          if (!category) {
            throw invalidArgument(`Unknown category: ${trimmed}`)
          }
          nextCategoryId = category.id
        }

        const plan = planCategoryTransition(topic.categoryId, nextCategoryId)
        if (!plan) {
          return { changed: false, categoryId: topic.categoryId }
        }
        await applyCategoryTransition(tx, topicId, plan, featuredLimit)
        return { changed: true, categoryId: nextCategoryId }
      })

      if (result.changed) {
        logger.info({ topicId, categoryId: result.categoryId }, 'Changed topic category')
      }
      return result
    },

    featureTopicsFor(categoryId, executor = db) {
      return runInTransaction(executor, (tx) => featureTopicsInCategory(tx, categoryId, featuredLimit))
    },
  }
}
