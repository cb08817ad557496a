import { drizzle } from 'drizzle-orm/postgres-js'
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import postgres from 'postgres'
import * as schema from './schema/index.js'

export function createDb(databaseUrl: string) {
  const client = postgres(databaseUrl, {
    max: 20,
    idle_timeout: 30,
    connect_timeout: 5,
  })

  const db = drizzle(client, { schema })

  return { db, client }
}

export type Database = ReturnType<typeof createDb>['db']

/**
 * Anything a query can run on: the pool or an open transaction. Calling
 * `transaction()` on a transaction opens a savepoint.
 */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>

/** The handle drizzle passes to a `transaction()` callback. */
export type Transaction = Parameters<Parameters<Executor['transaction']>[0]>[0]
