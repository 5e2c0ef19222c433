/**
 * Server entry point
 *
 * Loads `.env`, opens the SQLite store and serves the HTTP API until SIGINT or
 * SIGTERM, then closes the listener before the store.
 */
import dotenv from 'dotenv'
import { loadConfig } from './config'
import { createApp } from './http/app'
import { createLogger, logger as log, setLogLevel } from './logger'
import { createSqliteAdapter } from './sqlite-adapter'

dotenv.config()

async function main() {
  const config = loadConfig()
  // Domain modules log through the shared logger
  setLogLevel(config.logLevel)

  // Store must be ready before routes
  const adapter = await createSqliteAdapter(config.databasePath)

  const app = createApp({
    adapter,
    logger: log,
    corsOrigins: config.corsOrigins,
    requestLogFormat: config.requestLogFormat,
    jsonBodyLimit: config.jsonBodyLimit,
  })

  const server = app.listen(config.port, config.host, () => {
    log.info(`[server] Listening on http://${config.host}:${config.port} (db: ${config.databasePath})`)
  })

  let closing = false
  const shutdown = (signal: string) => {
    if (closing) return
    closing = true
    log.info(`[server] ${signal} received, shutting down`)
    server.close((err) => {
      adapter
        .close()
        .then(() => process.exit(err ? 1 : 0))
        .catch((closeErr: unknown) => {
          log.error('[server] Failed to close store:', closeErr)
          process.exit(1)
        })
    })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err: unknown) => {
  createLogger('error').error('[server] Fatal startup error:', err)
  process.exit(1)
})
