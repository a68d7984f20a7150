/**
 * One executor per pipeline stage. The registry is a mapped type over the stage
 * names, so every stage must be implemented and each returns its own artifact
 * type. Executors read earlier outputs only through `loadArtifact`, which serves
 * artifacts of stages recorded as completed.
 */
import path from 'path'
import type pino from 'pino'
import type { JobMetadata, JobRecord, StageName } from '../models/Job'
import type { ArtifactOf } from '../models/artifacts'
import { getWordCount, type FrameRecord } from '../models/Transcript'
import type { Collaborators } from '../services/collaborators'
import { buildUnifiedTranscript } from '../services/integration'
import { summarizeChapters, summarizeOverall, type BatcherEvent } from '../services/summarizationBatcher'
import { displayName } from '../utils/sanitizeFilename'

export interface StageSettings {
  sceneDetectThreshold: number
  frameSimilarityThreshold: number
  transcribeLanguage?: string
  summaryMaxInputTokens: number
}

export interface StageContext {
  job: JobRecord
  /** Per-job scratch directory for collaborator output files. */
  workDir: string
  settings: StageSettings
  collaborators: Collaborators
  loadArtifact<S extends StageName>(stage: S): Promise<ArtifactOf<S>>
  onBatcherEvent(event: BatcherEvent): void
  /** Aborted when the stage runs past its timeout. */
  signal: AbortSignal
  log: pino.Logger
}

export interface StageResult<S extends StageName> {
  artifact: ArtifactOf<S>
  metadata?: Partial<JobMetadata>
}

export interface StageExecutor<S extends StageName> {
  readonly stage: S
  execute(ctx: StageContext): Promise<StageResult<S>>
}

export type StageRegistry = { [S in StageName]: StageExecutor<S> }

const extractAudio: StageExecutor<'extract_audio'> = {
  stage: 'extract_audio',
  async execute({ job, workDir, collaborators, signal }) {
    const audio = await collaborators.extractor.extractAudio(job.videoPath, workDir, { signal })
    return { artifact: audio, metadata: { durationSec: audio.durationSec } }
  },
}

const extractFrames: StageExecutor<'extract_frames'> = {
  stage: 'extract_frames',
  async execute({ job, workDir, settings, collaborators, signal, log }) {
    const frames = await collaborators.extractor.extractKeyframes(job.videoPath, path.join(workDir, 'frames'), {
      sceneThreshold: settings.sceneDetectThreshold,
      similarityThreshold: settings.frameSimilarityThreshold,
      signal,
    })
    log.info({ msg: 'keyframes extracted', count: frames.length })
    return { artifact: { frames }, metadata: { totalFrames: frames.length } }
  },
}

const transcribe: StageExecutor<'transcribe'> = {
  stage: 'transcribe',
  async execute({ settings, collaborators, loadArtifact, signal }) {
    const { audioPath } = await loadArtifact('extract_audio')
    const output = await collaborators.transcriber.transcribe(audioPath, {
      language: settings.transcribeLanguage,
      signal,
    })
    const segments = [...output.segments].sort((a, b) => a.start - b.start)
    return {
      artifact: { segments, language: output.language, durationSec: output.durationSec },
    }
  },
}

const ocr: StageExecutor<'ocr'> = {
  stage: 'ocr',
  async execute({ collaborators, loadArtifact, signal, log }) {
    const { frames } = await loadArtifact('extract_frames')
    const records: FrameRecord[] = []
    // One image at a time: the engine shares the GPU with transcription.
    for (const frame of frames) {
      const text = await collaborators.ocr.recognize(frame.imagePath, { signal })
      records.push({ ...frame, ocrText: text.trim() })
    }
    log.info({ msg: 'ocr finished', frames: records.length, withText: records.filter((r) => r.ocrText).length })
    return { artifact: { frames: records } }
  },
}

const integrate: StageExecutor<'integrate'> = {
  stage: 'integrate',
  async execute({ job, loadArtifact }) {
    const audio = await loadArtifact('extract_audio')
    const transcript = await loadArtifact('transcribe')
    const { frames } = await loadArtifact('ocr')
    const unified = buildUnifiedTranscript({
      sourceFile: job.sourceName,
      durationSec: transcript.durationSec ?? audio.durationSec,
      language: transcript.language,
      frames,
      segments: transcript.segments,
    })
    return { artifact: unified }
  },
}

const summarize: StageExecutor<'summarize'> = {
  stage: 'summarize',
  async execute({ settings, collaborators, loadArtifact, onBatcherEvent, signal }) {
    const transcript = await loadArtifact('integrate')
    const budget = settings.summaryMaxInputTokens
    const options = { onEvent: onBatcherEvent, signal }
    const chapters = await summarizeChapters(transcript.chapters, budget, collaborators.summarizer, options)
    const overallSummary = await summarizeOverall(chapters, budget, collaborators.summarizer, options)
    return { artifact: { ...transcript, chapters, overallSummary } }
  },
}

const generateOutput: StageExecutor<'generate_output'> = {
  stage: 'generate_output',
  async execute({ job, collaborators, loadArtifact }) {
    const transcript = await loadArtifact('summarize')
    const documentPath = await collaborators.renderer.render(transcript, {
      jobId: job.id,
      title: displayName(job.sourceName),
    })
    return { artifact: { documentPath }, metadata: { wordCount: getWordCount(transcript) } }
  },
}

export const defaultStages: StageRegistry = {
  extract_audio: extractAudio,
  extract_frames: extractFrames,
  transcribe,
  ocr,
  integrate,
  summarize,
  generate_output: generateOutput,
}
