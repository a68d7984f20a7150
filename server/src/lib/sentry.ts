/**
 * Sentry for the pipeline worker: job failures only. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 */
import * as Sentry from '@sentry/node'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

const log = getLogger('worker')

export function isSentryEnabled(): boolean {
  return Boolean(DSN?.trim())
}

export function initSentry(): void {
  if (!isSentryEnabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
    })
  } catch (err) {
    log.warn({ msg: 'Sentry init failed', err })
  }
}

/** Capture a stage failure with jobId/stage tags. Reporting problems never affect the job. */
export function captureJobError(jobId: string, stage: string, err: unknown): void {
  if (!isSentryEnabled()) return
  try {
    Sentry.withScope((scope) => {
      scope.setTag('service', 'worker')
      scope.setTag('job_id', jobId)
      scope.setTag('stage', stage)
      Sentry.captureException(err)
    })
  } catch (captureErr) {
    log.warn({ msg: 'Sentry capture failed', jobId, err: captureErr })
  }
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!isSentryEnabled()) return
  await Sentry.flush(timeoutMs)
}
