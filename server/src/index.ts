import './env'
import { mkdir } from 'fs/promises'
import { flushSentry, initSentry } from './lib/sentry'
import { getLogger } from './lib/logger'
import { InMemoryJobStore, type JobStore } from './models/Job'
import { RedisJobStore } from './models/redisJobStore'
import { FileArtifactStore } from './services/artifactStore'
import type { Collaborators } from './services/collaborators'
import { FfmpegMediaExtractor } from './services/ffmpeg'
import { HtmlDocumentRenderer } from './services/htmlRenderer'
import { VisionOcrEngine } from './services/ocr'
import { OpenAiSummarizer } from './services/transcriptSummary'
import { WhisperTranscriber } from './services/transcription'
import { loadPipelineConfig, type PipelineConfig } from './utils/pipelineConfig'
import { createRedisClient } from './utils/redis'
import { InboxWatcher } from './workers/inboxWatcher'
import { PipelineScheduler, type JobEvent } from './workers/pipelineScheduler'

initSentry()

const log = getLogger('pipeline')

export function createCollaborators(config: PipelineConfig): Collaborators {
  return {
    extractor: new FfmpegMediaExtractor(),
    transcriber: new WhisperTranscriber({ model: config.openai.transcribeModel }),
    ocr: new VisionOcrEngine({ model: config.openai.ocrModel }),
    summarizer: new OpenAiSummarizer({ model: config.openai.summaryModel }),
    renderer: new HtmlDocumentRenderer({ outputDir: config.storage.outputDir }),
  }
}

async function main(): Promise<void> {
  const config = loadPipelineConfig()
  await Promise.all(
    [config.storage.inputDir, config.storage.processingDir, config.storage.outputDir].map((dir) =>
      mkdir(dir, { recursive: true })
    )
  )
  if (!process.env.OPENAI_API_KEY) {
    log.warn({ msg: 'OPENAI_API_KEY not set; transcription, OCR and summaries will fail' })
  }

  const redis = config.jobStore === 'redis' ? createRedisClient(config.redisUrl) : undefined
  const store: JobStore = redis ? new RedisJobStore(redis) : new InMemoryJobStore()
  const artifacts = new FileArtifactStore(config.storage.processingDir)

  const scheduler = new PipelineScheduler({
    store,
    artifacts,
    collaborators: createCollaborators(config),
    config: {
      maxConcurrentJobs: config.maxConcurrentJobs,
      stageTimeoutsMs: config.stageTimeoutsMs,
      sceneDetectThreshold: config.sceneDetectThreshold,
      frameSimilarityThreshold: config.frameSimilarityThreshold,
      transcribeLanguage: config.transcribeLanguage,
      summaryMaxInputTokens: config.summaryMaxInputTokens,
    },
  })
  scheduler.on('job:completed', ({ jobId, job }: JobEvent) => {
    log.info({ msg: 'study document ready', jobId, artifact: job.artifacts.generate_output })
  })
  scheduler.on('job:failed', ({ jobId, stage, error }: JobEvent) => {
    log.warn({ msg: 'job failed; retry after fixing the cause', jobId, stage, error })
  })

  const recovered = await scheduler.recover()
  if (recovered.length > 0) log.info({ msg: 'jobs recovered', count: recovered.length })

  const watcher = new InboxWatcher({
    inputDir: config.storage.inputDir,
    submit: (input) => scheduler.submit(input),
    artifacts,
  })
  await watcher.start()
  log.info({
    msg: 'pipeline started',
    maxConcurrentJobs: config.maxConcurrentJobs,
    jobStore: config.jobStore,
    storage: config.storage.root,
  })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ msg: `${signal} received, shutting down gracefully` })
    watcher.stop()
    await scheduler.stop()
    await flushSentry()
    await redis?.quit()
    log.info({ msg: 'pipeline stopped' })
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ msg: 'shutdown failed', err })
        process.exit(1)
      })
    })
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log.fatal({ msg: 'pipeline failed to start', err })
    process.exit(1)
  })
}
