import { JobNotFoundError } from '../lib/errors'

export const STAGES = [
  'extract_audio',
  'extract_frames',
  'transcribe',
  'ocr',
  'integrate',
  'summarize',
  'generate_output',
] as const

export type StageName = (typeof STAGES)[number]

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed' | 'cancelled'

export type StageStatus = 'pending' | 'processing' | 'completed' | 'failed'

export type StageStatusMap = Record<StageName, StageStatus>

export interface JobMetadata {
  durationSec?: number
  totalFrames?: number
  wordCount?: number
}

export interface JobRecord {
  id: string
  ownerId: string

  // Source video
  videoPath: string
  sourceName: string

  // Lifecycle
  status: JobStatus
  stage: StageName
  stages: StageStatusMap
  progress: number
  cancelRequested: boolean
  retryCount: number

  // One opaque reference per completed stage output
  artifacts: Partial<Record<StageName, string>>
  metadata: JobMetadata

  // Timestamps (ISO-8601)
  createdAt: string
  updatedAt: string
  startedAt?: string
  completedAt?: string
  failedAt?: string
  cancelledAt?: string

  // Set iff status === 'failed'
  error?: string
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled'
}

/**
 * Keyed job registry. `update` applies the mutator atomically: if it throws,
 * nothing is written.
 */
export interface JobStore {
  insert(job: JobRecord): Promise<void>
  get(id: string): Promise<JobRecord | undefined>
  update(id: string, mutator: (job: JobRecord) => JobRecord): Promise<JobRecord>
  list(): Promise<JobRecord[]>
  delete(id: string): Promise<boolean>
}

function clone(job: JobRecord): JobRecord {
  return structuredClone(job)
}

/** Lightweight in-process store; snapshots are copies so callers never hold live state. */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>()

  async insert(job: JobRecord): Promise<void> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job already exists: ${job.id}`)
    }
    this.jobs.set(job.id, clone(job))
  }

  async get(id: string): Promise<JobRecord | undefined> {
    const job = this.jobs.get(id)
    return job ? clone(job) : undefined
  }

  async update(id: string, mutator: (job: JobRecord) => JobRecord): Promise<JobRecord> {
    const current = this.jobs.get(id)
    if (!current) {
      throw new JobNotFoundError(id)
    }
    const next = mutator(clone(current))
    this.jobs.set(id, clone(next))
    return clone(next)
  }

  async list(): Promise<JobRecord[]> {
    // Newest first; jobs created in the same millisecond keep newest-first by insertion.
    return [...this.jobs.values()]
      .reverse()
      .map(clone)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id)
  }
}
