import { EventEmitter } from 'events'
import path from 'path'
import {
  InvalidStateError,
  JobNotFoundError,
  NotReadyError,
  toStageError,
  type StageError,
} from '../lib/errors'
import { getLogger, redactFilePath, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { isTerminal, type JobRecord, type JobStore, type StageName } from '../models/Job'
import {
  assertStageInvariant,
  beginProcessing,
  completeStage,
  createJobRecord,
  failStage,
  finalizeCancellation,
  nextPendingStage,
  recoverInterrupted,
  requestCancellation,
  resetForRetry,
  startStage,
} from '../models/jobStateMachine'
import type { UnifiedTranscript } from '../models/Transcript'
import type { ArtifactStore } from '../services/artifactStore'
import type { Collaborators } from '../services/collaborators'
import type { BatcherEvent } from '../services/summarizationBatcher'
import { defaultStages, type StageContext, type StageRegistry, type StageSettings } from './stages'

export interface SchedulerConfig extends StageSettings {
  maxConcurrentJobs: number
  stageTimeoutsMs: Record<StageName, number>
}

export interface SchedulerOptions {
  store: JobStore
  artifacts: ArtifactStore
  collaborators: Collaborators
  config: SchedulerConfig
  stages?: StageRegistry
}

export interface SubmitInput {
  videoPath: string
  ownerId: string
  sourceName?: string
  /** Lets callers that prepare files under the job's directory pick the id first. */
  jobId?: string
}

/** Payload of every `job:*` and `stage:*` event. */
export interface JobEvent {
  jobId: string
  job: JobRecord
  stage?: StageName
  error?: string
}

export interface OversizedSummaryEvent {
  jobId: string
  event: BatcherEvent
}

/** Rejects after `ms` and aborts the signal handed to `run`, so the stage's collaborators stop too. */
function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, ms: number, stage: StageName): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = toStageError(stage, new Error(`Stage ${stage} timed out after ${ms} ms`))
      reject(err)
      controller.abort(err)
    }, ms)
  })
  return Promise.race([run(controller.signal), timeout]).finally(() => clearTimeout(timer))
}

/**
 * FIFO scheduler over a fixed number of worker slots. Each slot drives one job
 * through its stages in order, persisting every transition through the job
 * store. Dispatch happens on enqueue and on worker release; nothing polls.
 */
export class PipelineScheduler extends EventEmitter {
  private readonly store: JobStore
  private readonly artifacts: ArtifactStore
  private readonly collaborators: Collaborators
  private readonly config: SchedulerConfig
  private readonly stages: StageRegistry
  private readonly log = getLogger('pipeline')

  private readonly queue: string[] = []
  private readonly running = new Map<string, Promise<void>>()
  /** Jobs re-queued (retried) while their previous run still held a worker slot. */
  private readonly requeueOnRelease = new Set<string>()
  private idleWaiters: Array<() => void> = []
  private stopped = false

  constructor(options: SchedulerOptions) {
    super()
    this.store = options.store
    this.artifacts = options.artifacts
    this.collaborators = options.collaborators
    this.config = options.config
    this.stages = options.stages ?? defaultStages
  }

  get activeWorkers(): number {
    return this.running.size
  }

  get queuedJobIds(): string[] {
    return [...this.queue]
  }

  async submit(input: SubmitInput): Promise<string> {
    const job = createJobRecord(
      {
        ownerId: input.ownerId,
        videoPath: input.videoPath,
        sourceName: input.sourceName ?? path.basename(input.videoPath),
      },
      input.jobId
    )
    await this.store.insert(job)
    this.log.info({ msg: 'job submitted', jobId: job.id, file: redactFilePath(job.videoPath) })
    this.enqueue(job.id, job)
    return job.id
  }

  enqueue(jobId: string, job?: JobRecord): void {
    if (this.queue.includes(jobId) || this.requeueOnRelease.has(jobId)) return
    if (this.running.has(jobId)) {
      this.requeueOnRelease.add(jobId)
    } else {
      this.queue.push(jobId)
    }
    if (job) this.emit('job:queued', { jobId, job } satisfies JobEvent)
    this.dispatch()
  }

  dispatch(): void {
    while (!this.stopped && this.running.size < this.config.maxConcurrentJobs && this.queue.length > 0) {
      const jobId = this.queue.shift()
      if (jobId === undefined) break
      const run = this.runJob(jobId)
        .catch((err: unknown) => {
          withJobContext(jobId).error({ msg: 'worker crashed', err })
          captureJobError(jobId, 'scheduler', err)
        })
        .finally(() => {
          this.running.delete(jobId)
          if (this.requeueOnRelease.delete(jobId)) this.queue.push(jobId)
          this.emit('worker:released', { jobId })
          this.dispatch()
        })
      this.running.set(jobId, run)
    }
    this.notifyIfIdle()
  }

  async getStatus(jobId: string): Promise<JobRecord> {
    const job = await this.store.get(jobId)
    if (!job) throw new JobNotFoundError(jobId)
    return job
  }

  async getResult(jobId: string): Promise<UnifiedTranscript> {
    const job = await this.getStatus(jobId)
    const ref = job.artifacts.summarize
    if (job.status !== 'completed' || !ref) throw new NotReadyError(jobId, job.status)
    return this.artifacts.load(ref, 'summarize')
  }

  /** Path of the rendered document of a completed job. */
  async getDocumentPath(jobId: string): Promise<string> {
    const job = await this.getStatus(jobId)
    const ref = job.artifacts.generate_output
    if (job.status !== 'completed' || !ref) throw new NotReadyError(jobId, job.status)
    const { documentPath } = await this.artifacts.load(ref, 'generate_output')
    return documentPath
  }

  /**
   * Queued jobs are cancelled at once and leave the queue. A processing job is
   * flagged; its worker stops before the next stage.
   */
  async cancel(jobId: string): Promise<JobRecord> {
    const job = await this.transition(jobId, requestCancellation)
    if (job.status === 'cancelled') {
      this.removeFromQueue(jobId)
      this.log.info({ msg: 'job cancelled while queued', jobId })
      this.emit('job:cancelled', { jobId, job } satisfies JobEvent)
      this.notifyIfIdle()
    } else {
      this.log.info({ msg: 'cancellation requested', jobId, stage: job.stage })
    }
    return job
  }

  async retry(jobId: string): Promise<JobRecord> {
    const job = await this.transition(jobId, resetForRetry)
    this.log.info({ msg: 'job retried', jobId, stage: job.stage, retryCount: job.retryCount })
    this.enqueue(jobId, job)
    return job
  }

  listJobs(): Promise<JobRecord[]> {
    return this.store.list()
  }

  /** Removes a finished job's record, its artifacts and its rendered document. */
  async deleteJob(jobId: string): Promise<void> {
    const job = await this.getStatus(jobId)
    if (!isTerminal(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is ${job.status}; only finished jobs can be deleted`)
    }
    const documentRef = job.artifacts.generate_output
    if (documentRef) {
      const { documentPath } = await this.artifacts.load(documentRef, 'generate_output')
      await this.collaborators.renderer.remove(documentPath)
    }
    await this.artifacts.removeJob(jobId)
    await this.store.delete(jobId)
    this.log.info({ msg: 'job deleted', jobId })
  }

  /**
   * Re-queues persisted work after a restart, oldest first: queued jobs as they
   * are, processing jobs with their interrupted stage reset to pending. Jobs
   * this scheduler already runs or queues are left alone.
   */
  async recover(): Promise<string[]> {
    const jobs = (await this.store.list()).reverse()
    const recovered: string[] = []
    for (const job of jobs) {
      if (this.isOwned(job.id)) continue
      if (job.status === 'processing') {
        const reset = await this.transition(job.id, recoverInterrupted)
        this.log.warn({ msg: 'recovered interrupted job', jobId: job.id, stage: reset.stage })
        this.enqueue(job.id, reset)
        recovered.push(job.id)
      } else if (job.status === 'queued') {
        this.enqueue(job.id, job)
        recovered.push(job.id)
      }
    }
    return recovered
  }

  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise((resolve) => this.idleWaiters.push(resolve))
  }

  /** Stops dispatching and waits for the running workers to finish. */
  async stop(): Promise<void> {
    this.stopped = true
    await Promise.all([...this.running.values()])
    this.notifyIfIdle()
  }

  private isIdle(): boolean {
    return this.running.size === 0 && (this.queue.length === 0 || this.stopped)
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  private isOwned(jobId: string): boolean {
    return this.running.has(jobId) || this.queue.includes(jobId) || this.requeueOnRelease.has(jobId)
  }

  private removeFromQueue(jobId: string): void {
    const i = this.queue.indexOf(jobId)
    if (i >= 0) this.queue.splice(i, 1)
    this.requeueOnRelease.delete(jobId)
  }

  /** Every write goes through here: a transition that breaks the stage invariant is never stored. */
  private transition(jobId: string, mutator: (job: JobRecord) => JobRecord): Promise<JobRecord> {
    return this.store.update(jobId, (current) => {
      const next = mutator(current)
      assertStageInvariant(next)
      return next
    })
  }

  private async runJob(jobId: string): Promise<void> {
    let job: JobRecord
    try {
      job = await this.transition(jobId, beginProcessing)
    } catch (err) {
      // Cancelled or deleted between enqueue and dispatch.
      if (err instanceof InvalidStateError || err instanceof JobNotFoundError) {
        this.log.debug({ msg: 'skipping job', jobId, reason: err.message })
        return
      }
      throw err
    }
    this.emit('job:started', { jobId, job } satisfies JobEvent)

    for (;;) {
      const stage = nextPendingStage(job)
      if (!stage) return

      // The cancel flag is read from the stored record in the same write that
      // would start the stage, so a cancel accepted before it always wins.
      job = await this.transition(jobId, (current) =>
        current.cancelRequested ? finalizeCancellation(current) : startStage(current, stage)
      )
      if (job.status === 'cancelled') {
        this.announceCancelled(job)
        return
      }
      const log = withJobContext(jobId, stage)
      log.info({ msg: 'stage started', progress: job.progress })
      this.emit('stage:started', { jobId, job, stage } satisfies JobEvent)

      let ref: string
      let metadata: JobRecord['metadata'] | undefined
      try {
        const running = job
        const result = await withTimeout(
          (signal) => this.executeStage(running, stage, signal),
          this.config.stageTimeoutsMs[stage],
          stage
        )
        ref = await this.artifacts.save(jobId, stage, result.artifact)
        metadata = result.metadata
      } catch (err) {
        job = await this.handleStageFailure(job, stage, toStageError(stage, err))
        if (job.cancelRequested) await this.finishCancelled(job)
        return
      }

      job = await this.transition(jobId, (current) => {
        const next = completeStage(current, stage, ref)
        return metadata ? { ...next, metadata: { ...next.metadata, ...metadata } } : next
      })
      log.info({ msg: 'stage completed', progress: job.progress })
      this.emit('stage:completed', { jobId, job, stage } satisfies JobEvent)

      if (job.status === 'completed') {
        log.info({ msg: 'job completed', metadata: job.metadata })
        this.emit('job:completed', { jobId, job } satisfies JobEvent)
        return
      }
    }
  }

  private executeStage<S extends StageName>(job: JobRecord, stage: S, signal: AbortSignal) {
    const ctx: StageContext = {
      job,
      workDir: this.artifacts.jobDir(job.id),
      settings: this.config,
      collaborators: this.collaborators,
      loadArtifact: async (dependency) => {
        const ref = job.artifacts[dependency]
        if (job.stages[dependency] !== 'completed' || !ref) {
          throw new InvalidStateError(`Stage ${stage} needs ${dependency}, which has not completed`)
        }
        return this.artifacts.load(ref, dependency)
      },
      onBatcherEvent: (event) => {
        withJobContext(job.id, stage).warn({ msg: 'summarizer input unit over budget', ...event })
        this.emit('summary:oversized', { jobId: job.id, event } satisfies OversizedSummaryEvent)
      },
      signal,
      log: withJobContext(job.id, stage),
    }
    return this.stages[stage].execute(ctx)
  }

  private async handleStageFailure(job: JobRecord, stage: StageName, err: StageError): Promise<JobRecord> {
    const failed = await this.transition(job.id, (current) => failStage(current, stage, err.message))
    withJobContext(job.id, stage).error({ msg: 'stage failed', err })
    captureJobError(job.id, stage, err)
    this.emit('stage:failed', { jobId: job.id, job: failed, stage, error: err.message } satisfies JobEvent)
    if (!failed.cancelRequested) {
      this.emit('job:failed', { jobId: job.id, job: failed, stage, error: err.message } satisfies JobEvent)
    }
    return failed
  }

  /** A retry that landed after the failure cleared the request; the job is then left as it is. */
  private async finishCancelled(job: JobRecord): Promise<void> {
    const cancelled = await this.transition(job.id, (current) =>
      current.cancelRequested ? finalizeCancellation(current) : current
    )
    if (cancelled.status === 'cancelled') this.announceCancelled(cancelled)
  }

  private announceCancelled(job: JobRecord): void {
    withJobContext(job.id).info({ msg: 'job cancelled', stage: job.stage })
    this.emit('job:cancelled', { jobId: job.id, job } satisfies JobEvent)
  }
}
