/**
 * Structured JSON logger for the pipeline, its workers and the inbox watcher.
 * Single format: level, timestamp, service, env, release, jobId/stage.
 * Redacts known sensitive keys. LOG_LEVEL overrides; silent under NODE_ENV=test.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'token',
  '*.apiKey',
  'OPENAI_API_KEY',
  'REDIS_URL',
  'SENTRY_DSN',
]

export type ServiceName = 'pipeline' | 'worker' | 'watcher'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger carrying jobId (and the running stage, when known). */
export function withJobContext(jobId: string, stage?: string): pino.Logger {
  return getLogger('worker').child({ jobId, stage })
}

/** Redact a string for safe logging (e.g. file paths: keep basename only). */
export function redactFilePath(path: string): string {
  if (!path) return '[REDACTED]'
  const parts = path.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
