import { z } from 'zod/v4'

const portSchema = z
  .string()
  .default('3000')
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535))

const intFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0))

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive())

const booleanFromString = (defaultVal: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultVal)
    .transform((v) => v === 'true')

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),
  VALKEY_URL: z.url(),

  // Server
  HOST: z.string().default('0.0.0.0'),
  PORT: portSchema,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  PUBLIC_URL: z.string().default('http://localhost:3000'),

  // CORS
  CORS_ORIGINS: z.string().default('http://localhost:3001'),

  // Rate Limiting (requests per minute)
  RATE_LIMIT_READ: intFromString('300'),
  RATE_LIMIT_WRITE: intFromString('30'),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),

  // Topic policy
  TOPIC_TITLE_MIN_LENGTH: positiveIntFromString('15'),
  TOPIC_TITLE_MAX_LENGTH: positiveIntFromString('255'),
  ALLOW_DUPLICATE_TOPIC_TITLES: booleanFromString('false'),
  MAX_TOPICS_PER_DAY: intFromString('20'),
  MAX_PRIVATE_MESSAGES_PER_DAY: intFromString('20'),
  MAX_STARS_PER_DAY: intFromString('20'),
  CATEGORY_FEATURED_TOPICS: positiveIntFromString('6'),

  // Actor for category-derived auto-close when the topic creator is not staff
  SYSTEM_USER_ID: z
    .string()
    .default('-1')
    .transform((val) => Number(val))
    .pipe(z.number().int()),

  // Jobs
  AVG_TIME_CRON: z.string().default('0 */6 * * *'),
})

export type Env = z.infer<typeof envSchema>

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const formatted = z.prettifyError(result.error)
    throw new Error(`Invalid environment configuration:\n${formatted}`)
  }
  if (result.data.TOPIC_TITLE_MIN_LENGTH > result.data.TOPIC_TITLE_MAX_LENGTH) {
    throw new Error(
      'Invalid environment configuration:\nTOPIC_TITLE_MIN_LENGTH must not exceed TOPIC_TITLE_MAX_LENGTH'
    )
  }
  return result.data
}

/**
 * Forum policy handed to the topic services. Kept separate from Env so the
 * services can be built in tests without a full process environment.
 */
export interface TopicSettings {
  titleMinLength: number
  titleMaxLength: number
  allowDuplicateTitles: boolean
  maxTopicsPerDay: number
  maxPrivateMessagesPerDay: number
  maxStarsPerDay: number
  categoryFeaturedTopics: number
  systemUserId: number
  baseUrl: string
}

export function topicSettingsFromEnv(env: Env): TopicSettings {
  return {
    titleMinLength: env.TOPIC_TITLE_MIN_LENGTH,
    titleMaxLength: env.TOPIC_TITLE_MAX_LENGTH,
    allowDuplicateTitles: env.ALLOW_DUPLICATE_TOPIC_TITLES,
    maxTopicsPerDay: env.MAX_TOPICS_PER_DAY,
    maxPrivateMessagesPerDay: env.MAX_PRIVATE_MESSAGES_PER_DAY,
    maxStarsPerDay: env.MAX_STARS_PER_DAY,
    categoryFeaturedTopics: env.CATEGORY_FEATURED_TOPICS,
    systemUserId: env.SYSTEM_USER_ID,
    baseUrl: env.PUBLIC_URL.replace(/\/+$/, ''),
  }
}
