import type { Collaborators } from '../src/services/collaborators'
import { InMemoryJobStore, type StageName } from '../src/models/Job'
import { InMemoryArtifactStore } from '../src/services/artifactStore'
import { PipelineScheduler, type SchedulerConfig } from '../src/workers/pipelineScheduler'

export interface Gate {
  promise: Promise<void>
  open: () => void
}

export function createGate(): Gate {
  let release: () => void = () => undefined
  const promise = new Promise<void>((resolve) => {
    release = resolve
  })
  return { promise, open: () => release() }
}

export function stageTimeouts(ms: number, overrides: Partial<Record<StageName, number>> = {}): Record<StageName, number> {
  return {
    extract_audio: ms,
    extract_frames: ms,
    transcribe: ms,
    ocr: ms,
    integrate: ms,
    summarize: ms,
    generate_output: ms,
    ...overrides,
  }
}

export const TEST_CONFIG: SchedulerConfig = {
  maxConcurrentJobs: 2,
  stageTimeoutsMs: stageTimeouts(5000),
  sceneDetectThreshold: 0.3,
  frameSimilarityThreshold: 5,
  summaryMaxInputTokens: 1000,
}

/**
 * In-process collaborators. Every call is appended to `calls` as
 * `<method>:<argument>` so tests can assert what ran and in which order.
 */
export function createFakeCollaborators(calls: string[]): Collaborators {
  return {
    extractor: {
      async extractAudio(videoPath, outputDir) {
        calls.push(`extractAudio:${videoPath}`)
        return { audioPath: `${outputDir}/audio.wav`, durationSec: 600 }
      },
      async extractKeyframes(videoPath, outputDir) {
        calls.push(`extractKeyframes:${videoPath}`)
        return [
          { timestamp: 0, imagePath: `${outputDir}/f0.jpg` },
          { timestamp: 300, imagePath: `${outputDir}/f1.jpg` },
        ]
      },
    },
    transcriber: {
      async transcribe(audioPath) {
        calls.push(`transcribe:${audioPath}`)
        return {
          segments: [
            { start: 310, end: 315, text: 'world' },
            { start: 0, end: 5, text: 'hello' },
          ],
          language: 'en',
        }
      },
    },
    ocr: {
      async recognize(imagePath) {
        calls.push(`ocr:${imagePath}`)
        return ` slide ${imagePath.slice(-6, -4)} `
      },
    },
    summarizer: {
      async summarize(text) {
        calls.push(`summarize:${text}`)
        return `summary of ${text.length} chars`
      },
    },
    renderer: {
      async render(transcript, options) {
        calls.push(`render:${options.jobId}`)
        return `/out/${options.jobId}.html`
      },
      async remove(documentPath) {
        calls.push(`remove:${documentPath}`)
      },
    },
  }
}

export interface Harness {
  scheduler: PipelineScheduler
  store: InMemoryJobStore
  artifacts: InMemoryArtifactStore
  calls: string[]
}

export function createHarness(
  overrides: Partial<Collaborators> = {},
  config: Partial<SchedulerConfig> = {},
  store = new InMemoryJobStore(),
  artifacts = new InMemoryArtifactStore('/work')
): Harness {
  const calls: string[] = []
  const scheduler = new PipelineScheduler({
    store,
    artifacts,
    collaborators: { ...createFakeCollaborators(calls), ...overrides },
    config: { ...TEST_CONFIG, ...config },
  })
  return { scheduler, store, artifacts, calls }
}
