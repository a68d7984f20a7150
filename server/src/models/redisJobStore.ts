import type Redis from 'ioredis'
import { JobNotFoundError } from '../lib/errors'
import type { JobRecord, JobStore } from './Job'

export const JOB_KEY_PREFIX = 'pipeline:job:'
export const JOB_INDEX_KEY = 'pipeline:jobs'

function jobKey(id: string): string {
  return `${JOB_KEY_PREFIX}${id}`
}

type ExecResult = [error: Error | null, result: unknown][] | null

function assertExecOk(results: ExecResult, what: string): void {
  if (!results) throw new Error(`Redis transaction for ${what} was aborted`)
  for (const [err] of results) {
    if (err) throw err
  }
}

/**
 * Job records as one JSON value per job plus a sorted-set index scored by
 * creation time. Writes for this process are serialized through a promise
 * chain and each lands in a single MULTI/EXEC, so a record is never half
 * written. A job has one writer (its scheduler), so no cross-process lock.
 */
export class RedisJobStore implements JobStore {
  private lock: Promise<void> = Promise.resolve()

  constructor(private readonly redis: Redis) {}

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn, fn)
    this.lock = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async read(id: string): Promise<JobRecord | undefined> {
    const raw = await this.redis.get(jobKey(id))
    if (raw == null) return undefined
    const job: JobRecord = JSON.parse(raw)
    return job
  }

  insert(job: JobRecord): Promise<void> {
    return this.withLock(async () => {
      if (await this.redis.exists(jobKey(job.id))) {
        throw new Error(`Job already exists: ${job.id}`)
      }
      const results = await this.redis
        .multi()
        .set(jobKey(job.id), JSON.stringify(job))
        .zadd(JOB_INDEX_KEY, Date.parse(job.createdAt), job.id)
        .exec()
      assertExecOk(results, `insert ${job.id}`)
    })
  }

  get(id: string): Promise<JobRecord | undefined> {
    return this.read(id)
  }

  update(id: string, mutator: (job: JobRecord) => JobRecord): Promise<JobRecord> {
    return this.withLock(async () => {
      const current = await this.read(id)
      if (!current) throw new JobNotFoundError(id)
      const next = mutator(current)
      const results = await this.redis.multi().set(jobKey(id), JSON.stringify(next)).exec()
      assertExecOk(results, `update ${id}`)
      return next
    })
  }

  async list(): Promise<JobRecord[]> {
    const ids = await this.redis.zrevrange(JOB_INDEX_KEY, 0, -1)
    if (ids.length === 0) return []
    const values = await this.redis.mget(ids.map(jobKey))
    const jobs: JobRecord[] = []
    for (const raw of values) {
      if (raw) jobs.push(JSON.parse(raw))
    }
    return jobs
  }

  delete(id: string): Promise<boolean> {
    return this.withLock(async () => {
      const results = await this.redis.multi().del(jobKey(id)).zrem(JOB_INDEX_KEY, id).exec()
      assertExecOk(results, `delete ${id}`)
      const removed = results?.[0]?.[1]
      return typeof removed === 'number' && removed > 0
    })
  }
}
