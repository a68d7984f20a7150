/**
 * Job lifecycle transitions. Every function is pure: it takes a job snapshot and
 * returns the next one, or throws InvalidStateError without touching its input.
 * The scheduler persists each result through JobStore.update, so one transition
 * is one atomic write.
 */
import { v4 as uuidv4 } from 'uuid'
import { InvalidStateError } from '../lib/errors'
import {
  STAGES,
  type JobRecord,
  type JobStatus,
  type StageName,
  type StageStatus,
  type StageStatusMap,
} from './Job'

export interface NewJobInput {
  ownerId: string
  videoPath: string
  sourceName: string
}

function nowIso(): string {
  return new Date().toISOString()
}

export function createJobId(): string {
  return `job_${uuidv4()}`
}

export function buildInitialStages(): StageStatusMap {
  return {
    extract_audio: 'pending',
    extract_frames: 'pending',
    transcribe: 'pending',
    ocr: 'pending',
    integrate: 'pending',
    summarize: 'pending',
    generate_output: 'pending',
  }
}

function withStageStatus(stages: StageStatusMap, stage: StageName, status: StageStatus): StageStatusMap {
  const next = { ...stages }
  next[stage] = status
  return next
}

export function createJobRecord(input: NewJobInput, id: string = createJobId()): JobRecord {
  const now = nowIso()
  return {
    id,
    ownerId: input.ownerId,
    videoPath: input.videoPath,
    sourceName: input.sourceName,
    status: 'queued',
    stage: STAGES[0],
    stages: buildInitialStages(),
    progress: 0,
    cancelRequested: false,
    retryCount: 0,
    artifacts: {},
    metadata: {},
    createdAt: now,
    updatedAt: now,
  }
}

export function stageIndex(stage: StageName): number {
  return STAGES.indexOf(stage)
}

export function previousStage(stage: StageName): StageName | undefined {
  const i = stageIndex(stage)
  return i > 0 ? STAGES[i - 1] : undefined
}

export function countCompletedStages(stages: StageStatusMap): number {
  return STAGES.filter((s) => stages[s] === 'completed').length
}

export function computeProgress(stages: StageStatusMap): number {
  return Math.round((100 * countCompletedStages(stages)) / STAGES.length)
}

/** First stage that still has to run, or undefined when every stage completed. */
export function nextPendingStage(job: JobRecord): StageName | undefined {
  return STAGES.find((s) => job.stages[s] === 'pending')
}

export function processingStage(job: JobRecord): StageName | undefined {
  return STAGES.find((s) => job.stages[s] === 'processing')
}

/**
 * Status implied by the stage map alone. Cancellation is an external request
 * and cannot be derived, so a cancelled job keeps its stored status.
 */
export function deriveStatus(job: JobRecord): JobStatus {
  if (job.status === 'cancelled') return 'cancelled'
  const values = STAGES.map((s) => job.stages[s])
  if (values.includes('failed')) return 'failed'
  if (values.every((v) => v === 'completed')) return 'completed'
  if (values.includes('processing')) return 'processing'
  if (values.every((v) => v === 'pending')) return job.status === 'processing' ? 'processing' : 'queued'
  return job.status === 'queued' ? 'queued' : 'processing'
}

/**
 * Completed prefix, then at most one stage that is processing or failed,
 * then a pending suffix.
 */
export function isStageMapConsistent(stages: StageStatusMap): boolean {
  let i = 0
  while (i < STAGES.length && stages[STAGES[i]] === 'completed') i++
  if (i < STAGES.length && (stages[STAGES[i]] === 'processing' || stages[STAGES[i]] === 'failed')) i++
  while (i < STAGES.length && stages[STAGES[i]] === 'pending') i++
  return i === STAGES.length
}

/** Checked on every stored transition: a consistent stage map that agrees with the status. */
export function assertStageInvariant(job: JobRecord): void {
  if (!isStageMapConsistent(job.stages)) {
    const summary = STAGES.map((s) => `${s}=${job.stages[s]}`).join(', ')
    throw new InvalidStateError(`Job ${job.id} has an inconsistent stage map: ${summary}`)
  }
  const derived = deriveStatus(job)
  if (derived !== job.status) {
    throw new InvalidStateError(`Job ${job.id} is ${job.status} but its stages say ${derived}`)
  }
}

export function beginProcessing(job: JobRecord): JobRecord {
  if (job.status !== 'queued') {
    throw new InvalidStateError(`Job ${job.id} cannot start from status ${job.status}`)
  }
  const now = nowIso()
  return {
    ...job,
    status: 'processing',
    startedAt: job.startedAt ?? now,
    updatedAt: now,
  }
}

export function startStage(job: JobRecord, stage: StageName): JobRecord {
  if (job.status !== 'processing') {
    throw new InvalidStateError(`Job ${job.id} is ${job.status}; stage ${stage} cannot start`)
  }
  if (job.cancelRequested) {
    throw new InvalidStateError(`Job ${job.id} has a pending cancellation; stage ${stage} cannot start`)
  }
  if (job.stages[stage] !== 'pending') {
    throw new InvalidStateError(`Stage ${stage} of job ${job.id} is ${job.stages[stage]}, not pending`)
  }
  const running = processingStage(job)
  if (running) {
    throw new InvalidStateError(`Job ${job.id} already has stage ${running} processing`)
  }
  const prev = previousStage(stage)
  if (prev && job.stages[prev] !== 'completed') {
    throw new InvalidStateError(`Stage ${stage} requires ${prev} to be completed (is ${job.stages[prev]})`)
  }
  const stages = withStageStatus(job.stages, stage, 'processing')
  return {
    ...job,
    stage,
    stages,
    progress: Math.max(job.progress, computeProgress(stages)),
    updatedAt: nowIso(),
  }
}

export function completeStage(job: JobRecord, stage: StageName, artifactRef: string): JobRecord {
  if (job.stages[stage] !== 'processing') {
    throw new InvalidStateError(`Stage ${stage} of job ${job.id} is ${job.stages[stage]}, not processing`)
  }
  const now = nowIso()
  const stages = withStageStatus(job.stages, stage, 'completed')
  const artifacts = { ...job.artifacts }
  artifacts[stage] = artifactRef
  const next: JobRecord = {
    ...job,
    stages,
    artifacts,
    progress: Math.max(job.progress, computeProgress(stages)),
    updatedAt: now,
  }
  if (stageIndex(stage) === STAGES.length - 1) {
    return {
      ...next,
      status: 'completed',
      progress: 100,
      completedAt: job.completedAt ?? now,
    }
  }
  return next
}

export function failStage(job: JobRecord, stage: StageName, reason: string): JobRecord {
  if (job.stages[stage] !== 'processing') {
    throw new InvalidStateError(`Stage ${stage} of job ${job.id} is ${job.stages[stage]}, not processing`)
  }
  const now = nowIso()
  return {
    ...job,
    stages: withStageStatus(job.stages, stage, 'failed'),
    status: 'failed',
    error: reason,
    failedAt: now,
    updatedAt: now,
  }
}

/**
 * Queued jobs are cancelled on the spot. Processing jobs are flagged and the
 * worker finalizes them once the in-flight stage returns.
 */
export function requestCancellation(job: JobRecord): JobRecord {
  const now = nowIso()
  if (job.status === 'queued') {
    return { ...job, status: 'cancelled', cancelledAt: now, updatedAt: now }
  }
  if (job.status === 'processing') {
    if (job.cancelRequested) return job
    return { ...job, cancelRequested: true, updatedAt: now }
  }
  throw new InvalidStateError(`Job ${job.id} is ${job.status} and cannot be cancelled`)
}

export function finalizeCancellation(job: JobRecord): JobRecord {
  if (!job.cancelRequested) {
    throw new InvalidStateError(`Job ${job.id} has no pending cancellation request`)
  }
  if (job.status !== 'processing' && job.status !== 'failed') {
    throw new InvalidStateError(`Job ${job.id} is ${job.status}; cancellation cannot be finalized`)
  }
  const running = processingStage(job)
  if (running) {
    throw new InvalidStateError(`Job ${job.id} still has stage ${running} in flight`)
  }
  const now = nowIso()
  return {
    ...job,
    status: 'cancelled',
    error: undefined,
    cancelledAt: now,
    updatedAt: now,
  }
}

/**
 * Only the failed stage goes back to pending. Completed stages keep their
 * artifacts and are never recomputed.
 */
export function resetForRetry(job: JobRecord): JobRecord {
  if (job.status !== 'failed') {
    throw new InvalidStateError(`Job ${job.id} is ${job.status}; only failed jobs can be retried`)
  }
  const failed = STAGES.find((s) => job.stages[s] === 'failed')
  const stages = failed ? withStageStatus(job.stages, failed, 'pending') : { ...job.stages }
  return {
    ...job,
    status: 'queued',
    stage: failed ?? job.stage,
    stages,
    error: undefined,
    failedAt: undefined,
    cancelRequested: false,
    retryCount: job.retryCount + 1,
    updatedAt: nowIso(),
  }
}

/**
 * For jobs found mid-flight after a restart: the interrupted stage produced no
 * recorded artifact, so it returns to pending and the job to the queue.
 */
export function recoverInterrupted(job: JobRecord): JobRecord {
  if (job.status !== 'processing') {
    throw new InvalidStateError(`Job ${job.id} is ${job.status}; nothing to recover`)
  }
  const running = processingStage(job)
  const stages = running ? withStageStatus(job.stages, running, 'pending') : { ...job.stages }
  return {
    ...job,
    status: 'queued',
    stages,
    updatedAt: nowIso(),
  }
}
