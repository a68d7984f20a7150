import assert from 'node:assert/strict'
import test from 'node:test'
import { InvalidStateError } from '../src/lib/errors'
import { STAGES, type JobRecord, type StageName } from '../src/models/Job'
import {
  assertStageInvariant,
  beginProcessing,
  completeStage,
  computeProgress,
  countCompletedStages,
  createJobRecord,
  deriveStatus,
  failStage,
  finalizeCancellation,
  isStageMapConsistent,
  nextPendingStage,
  recoverInterrupted,
  requestCancellation,
  resetForRetry,
  startStage,
} from '../src/models/jobStateMachine'

function newJob(): JobRecord {
  return createJobRecord({ ownerId: 'owner-1', videoPath: '/videos/talk.mp4', sourceName: 'talk.mp4' }, 'job_test')
}

function runThrough(job: JobRecord, stages: readonly StageName[]): JobRecord {
  let current = job
  for (const stage of stages) {
    current = completeStage(startStage(current, stage), stage, `ref:${stage}`)
  }
  return current
}

test('createJobRecord starts queued with every stage pending', () => {
  const job = newJob()
  assert.equal(job.id, 'job_test')
  assert.equal(job.status, 'queued')
  assert.equal(job.progress, 0)
  assert.equal(job.retryCount, 0)
  assert.ok(STAGES.every((s) => job.stages[s] === 'pending'))
  assert.equal(nextPendingStage(job), 'extract_audio')
})

test('createJobRecord generates prefixed unique ids', () => {
  const input = { ownerId: 'o', videoPath: '/v.mp4', sourceName: 'v.mp4' }
  const a = createJobRecord(input)
  const b = createJobRecord(input)
  assert.match(a.id, /^job_[0-9a-f-]{36}$/)
  assert.notEqual(a.id, b.id)
})

test('stages advance in order and progress tracks completed stages', () => {
  let job = beginProcessing(newJob())
  assert.equal(job.status, 'processing')
  assert.ok(job.startedAt)

  job = startStage(job, 'extract_audio')
  assert.equal(job.stages.extract_audio, 'processing')
  assert.equal(job.progress, 0)

  job = completeStage(job, 'extract_audio', 'ref:audio')
  assert.equal(job.progress, 14)
  assert.equal(job.artifacts.extract_audio, 'ref:audio')
  assert.equal(nextPendingStage(job), 'extract_frames')

  job = runThrough(job, STAGES.slice(1))
  assert.equal(job.status, 'completed')
  assert.equal(job.progress, 100)
  assert.ok(job.completedAt)
  assert.equal(deriveStatus(job), 'completed')
})

test('startStage refuses out-of-order and concurrent stages', () => {
  const job = beginProcessing(newJob())
  assert.throws(() => startStage(job, 'transcribe'), InvalidStateError)
  const running = startStage(job, 'extract_audio')
  assert.throws(() => startStage(running, 'extract_frames'), InvalidStateError)
  assert.throws(() => startStage(newJob(), 'extract_audio'), InvalidStateError)
})

test('failStage records the reason and halts the job', () => {
  let job = runThrough(beginProcessing(newJob()), ['extract_audio', 'extract_frames', 'transcribe'])
  job = failStage(startStage(job, 'ocr'), 'ocr', 'engine unavailable')
  assert.equal(job.status, 'failed')
  assert.equal(job.error, 'engine unavailable')
  assert.equal(job.stages.ocr, 'failed')
  assert.equal(job.stages.integrate, 'pending')
  assert.ok(job.failedAt)
  assert.equal(deriveStatus(job), 'failed')
  assert.ok(isStageMapConsistent(job.stages))
  assert.throws(() => startStage(job, 'integrate'), InvalidStateError)
})

test('resetForRetry re-queues only the failed stage and keeps artifacts', () => {
  let job = runThrough(beginProcessing(newJob()), ['extract_audio', 'extract_frames', 'transcribe'])
  job = failStage(startStage(job, 'ocr'), 'ocr', 'boom')
  const retried = resetForRetry(job)

  assert.equal(retried.status, 'queued')
  assert.equal(retried.stages.ocr, 'pending')
  assert.equal(retried.stages.transcribe, 'completed')
  assert.equal(retried.error, undefined)
  assert.equal(retried.failedAt, undefined)
  assert.equal(retried.retryCount, 1)
  assert.deepEqual(retried.artifacts, job.artifacts)
  assert.equal(nextPendingStage(retried), 'ocr')
  assert.equal(retried.progress, job.progress)
})

test('resetForRetry rejects jobs that did not fail', () => {
  const job = newJob()
  assert.throws(() => resetForRetry(job), InvalidStateError)
  assert.equal(job.status, 'queued')
})

test('requestCancellation cancels queued jobs immediately', () => {
  const job = requestCancellation(newJob())
  assert.equal(job.status, 'cancelled')
  assert.ok(job.cancelledAt)
  assert.ok(STAGES.every((s) => job.stages[s] === 'pending'))
  assert.throws(() => requestCancellation(job), InvalidStateError)
  assert.throws(() => beginProcessing(job), InvalidStateError)
})

test('requestCancellation flags processing jobs for the worker to finalize', () => {
  const running = startStage(beginProcessing(newJob()), 'extract_audio')
  const flagged = requestCancellation(running)
  assert.equal(flagged.status, 'processing')
  assert.equal(flagged.cancelRequested, true)

  assert.throws(() => finalizeCancellation(flagged), InvalidStateError)
  const done = completeStage(flagged, 'extract_audio', 'ref:audio')
  const cancelled = finalizeCancellation(done)
  assert.equal(cancelled.status, 'cancelled')
  assert.equal(cancelled.stages.extract_audio, 'completed')
  assert.equal(cancelled.artifacts.extract_audio, 'ref:audio')
})

test('finalizeCancellation wins over a failure that raced the request', () => {
  const flagged = requestCancellation(startStage(beginProcessing(newJob()), 'extract_audio'))
  const failed = failStage(flagged, 'extract_audio', 'decoder crashed')
  const cancelled = finalizeCancellation(failed)
  assert.equal(cancelled.status, 'cancelled')
  assert.equal(cancelled.error, undefined)
  assert.equal(cancelled.stages.extract_audio, 'failed')
})

test('requestCancellation rejects finished jobs', () => {
  const completed = runThrough(beginProcessing(newJob()), STAGES)
  assert.throws(() => requestCancellation(completed), InvalidStateError)
})

test('recoverInterrupted puts the in-flight stage back to pending', () => {
  let job = runThrough(beginProcessing(newJob()), ['extract_audio'])
  job = startStage(job, 'extract_frames')
  const recovered = recoverInterrupted(job)
  assert.equal(recovered.status, 'queued')
  assert.equal(recovered.stages.extract_frames, 'pending')
  assert.equal(recovered.stages.extract_audio, 'completed')
  assert.equal(nextPendingStage(recovered), 'extract_frames')
  assert.throws(() => recoverInterrupted(recovered), InvalidStateError)
})

test('isStageMapConsistent accepts only prefix / single active / pending suffix', () => {
  const base = newJob().stages
  assert.ok(isStageMapConsistent(base))
  assert.ok(isStageMapConsistent({ ...base, extract_audio: 'completed', extract_frames: 'processing' }))
  assert.equal(isStageMapConsistent({ ...base, extract_frames: 'completed' }), false)
  assert.equal(isStageMapConsistent({ ...base, extract_audio: 'processing', extract_frames: 'processing' }), false)
  assert.equal(isStageMapConsistent({ ...base, extract_audio: 'failed', extract_frames: 'completed' }), false)
})

test('computeProgress rounds the completed share of seven stages', () => {
  const stages = newJob().stages
  assert.equal(computeProgress(stages), 0)
  assert.equal(computeProgress({ ...stages, extract_audio: 'completed', extract_frames: 'completed' }), 29)
  assert.equal(
    computeProgress({
      ...stages,
      extract_audio: 'completed',
      extract_frames: 'completed',
      transcribe: 'completed',
      ocr: 'completed',
      integrate: 'completed',
      summarize: 'completed',
    }),
    86
  )
})

test('assertStageInvariant reports the whole stage map when it is broken', () => {
  const job = runThrough(beginProcessing(newJob()), STAGES.slice(0, 3))
  assert.equal(countCompletedStages(job.stages), 3)
  assert.doesNotThrow(() => assertStageInvariant(job))

  const broken: JobRecord = { ...job, stages: { ...job.stages, integrate: 'completed' } }
  assert.throws(() => assertStageInvariant(broken), {
    name: 'InvalidStateError',
    message:
      'Job job_test has an inconsistent stage map: extract_audio=completed, extract_frames=completed, ' +
      'transcribe=completed, ocr=pending, integrate=completed, summarize=pending, generate_output=pending',
  })
})

test('assertStageInvariant rejects a status the stages do not support', () => {
  const job = runThrough(beginProcessing(newJob()), STAGES.slice(0, 3))
  const premature: JobRecord = { ...job, status: 'completed' }
  assert.throws(() => assertStageInvariant(premature), {
    name: 'InvalidStateError',
    message: 'Job job_test is completed but its stages say processing',
  })
})

test('startStage refuses a job with a pending cancellation', () => {
  const flagged = requestCancellation(runThrough(beginProcessing(newJob()), ['extract_audio']))
  assert.throws(() => startStage(flagged, 'extract_frames'), /has a pending cancellation/)
  assert.equal(finalizeCancellation(flagged).status, 'cancelled')
})
