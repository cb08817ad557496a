import type { FastifyPluginCallback } from 'fastify'
import { sql } from 'drizzle-orm'

export const SERVICE_VERSION = '0.1.0'

interface CheckResult {
  status: 'healthy' | 'unhealthy'
  latency?: number
}

const healthRoutes: FastifyPluginCallback = (fastify, _opts, done) => {
  const dependencies: Record<string, () => Promise<unknown>> = {
    database: () => fastify.db.execute(sql`SELECT 1`),
    cache: () => fastify.cache.ping(),
  }

  async function check(
    name: string,
    ping: () => Promise<unknown>
  ): Promise<[string, CheckResult]> {
    const started = performance.now()
    try {
      await ping()
      return [name, { status: 'healthy', latency: Math.round(performance.now() - started) }]
    } catch (err: unknown) {
      fastify.log.warn({ err, check: name }, 'Readiness check failed')
      return [name, { status: 'unhealthy' }]
    }
  }

  fastify.get('/api/health', () => ({
    status: 'healthy',
    version: SERVICE_VERSION,
    uptime: process.uptime(),
  }))

  // Database and cache must both answer before the instance takes traffic
  fastify.get('/api/health/ready', async (_request, reply) => {
    const results = await Promise.all(
      Object.entries(dependencies).map(([name, ping]) => check(name, ping))
    )
    const checks = Object.fromEntries(results)
    const ready = results.every(([, result]) => result.status === 'healthy')

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'degraded',
      checks,
    })
  })

  done()
}

export default healthRoutes
