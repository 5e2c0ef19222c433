// Level-gated console logger

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

export type Logger = Record<LogLevel, (...args: unknown[]) => void>

const getTimestamp = (): string => {
  return new Date().toISOString()
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value)
}

// Default to 'error' in test environment, 'info' otherwise
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.LOG_LEVEL?.toLowerCase()
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return env.NODE_ENV === 'test' ? 'error' : 'info'
}

function buildLogger(currentLevel: () => LogLevel): Logger {
  const enabled = (l: LogLevel) => LEVEL_WEIGHTS[currentLevel()] <= LEVEL_WEIGHTS[l]

  return {
    trace: (...args) => {
      if (enabled('trace')) console.debug(`[${getTimestamp()}] [TRACE]`, ...args)
    },
    debug: (...args) => {
      if (enabled('debug')) console.debug(`[${getTimestamp()}] [DEBUG]`, ...args)
    },
    info: (...args) => {
      if (enabled('info')) console.log(`[${getTimestamp()}] [INFO]`, ...args)
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(`[${getTimestamp()}] [WARN]`, ...args)
    },
    error: (...args) => {
      if (enabled('error')) console.error(`[${getTimestamp()}] [ERROR]`, ...args)
    },
  }
}

/** Standalone logger fixed at `level`. */
export function createLogger(level: LogLevel): Logger {
  return buildLogger(() => level)
}

let sharedLevel: LogLevel = defaultLogLevel()

/** Shared logger used by the domain modules; its level follows setLogLevel. */
export const logger: Logger = buildLogger(() => sharedLevel)

export function setLogLevel(level: LogLevel): void {
  sharedLevel = level
}

export function getLogLevel(): LogLevel {
  return sharedLevel
}
