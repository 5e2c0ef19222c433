/**
 * Configuration
 *
 * Environment-driven settings, validated once at startup. Callers load `.env`
 * (see server.ts) before calling loadConfig.
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import { LOG_LEVELS, defaultLogLevel, type LogLevel } from './logger'

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).default('planner.db'),
  CORS_ORIGINS: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
  REQUEST_LOG_FORMAT: z.string().min(1).default('dev'),
  JSON_BODY_LIMIT: z.string().min(1).default('1mb'),
})

export type PlannerConfig = {
  port: number
  host: string
  databasePath: string
  /** null allows any origin */
  corsOrigins: string[] | null
  logLevel: LogLevel
  requestLogFormat: string
  jsonBodyLimit: string
}

function parseOrigins(raw: string | undefined): string[] | null {
  if (raw === undefined) return null
  const origins = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
  return origins.length > 0 ? origins : null
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`)
  }

  const e = parsed.data
  return {
    port: e.PORT,
    host: e.HOST,
    databasePath: e.DATABASE_PATH,
    corsOrigins: parseOrigins(e.CORS_ORIGINS),
    logLevel: e.LOG_LEVEL ?? defaultLogLevel(env),
    requestLogFormat: e.REQUEST_LOG_FORMAT,
    jsonBodyLimit: e.JSON_BODY_LIMIT,
  }
}
