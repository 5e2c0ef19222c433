import express, { type Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import morgan from 'morgan'
import type { Adapter } from '../adapter'
import { logger as defaultLogger, type Logger } from '../logger'
import { SCHEMA_VERSION_HEADER, SERIALIZATION_VERSION } from '../serialization'
import { errorHandler, notFoundHandler } from './errors'
import { registerRoutes } from './routes'

export type AppOptions = {
  adapter: Adapter
  logger?: Logger
  /** null or absent allows any origin */
  corsOrigins?: string[] | null
  requestLogFormat?: string
  jsonBodyLimit?: string
}

export function createApp(options: AppOptions): Express {
  const log = options.logger ?? defaultLogger
  const app = express()

  // Small hardening: hide Express fingerprint
  app.disable('x-powered-by')

  app.use(
    cors({
      origin: options.corsOrigins ?? '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
      exposedHeaders: [SCHEMA_VERSION_HEADER],
    }),
  )
  app.use(helmet())
  app.use(express.json({ limit: options.jsonBodyLimit ?? '1mb' }))
  app.use(
    morgan(options.requestLogFormat ?? 'dev', {
      stream: { write: (line: string) => log.info(line.trimEnd()) },
    }),
  )
  app.use((_req, res, next) => {
    res.setHeader(SCHEMA_VERSION_HEADER, String(SERIALIZATION_VERSION))
    next()
  })

  registerRoutes(app, options.adapter)

  app.use(notFoundHandler)
  app.use(errorHandler(log))
  return app
}
