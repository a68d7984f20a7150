/**
 * Pipeline limits and collaborator settings, read from the environment.
 * Invalid numbers fall back to the default; out-of-range values are clamped.
 */
import path from 'path'
import { STAGES, type StageName } from '../models/Job'

export type JobStoreKind = 'redis' | 'memory'

export interface StoragePaths {
  root: string
  inputDir: string
  processingDir: string
  outputDir: string
}

export interface PipelineConfig {
  maxConcurrentJobs: number
  sceneDetectThreshold: number
  frameSimilarityThreshold: number
  transcribeLanguage?: string
  summaryMaxInputTokens: number
  stageTimeoutsMs: Record<StageName, number>
  storage: StoragePaths
  jobStore: JobStoreKind
  redisUrl: string
  openai: {
    transcribeModel: string
    ocrModel: string
    summaryModel: string
  }
}

export const DEFAULT_MAX_CONCURRENT_JOBS = 2
export const DEFAULT_SCENE_DETECT_THRESHOLD = 0.3
export const DEFAULT_FRAME_SIMILARITY_THRESHOLD = 5
export const DEFAULT_SUMMARY_MAX_INPUT_TOKENS = 6000
export const DEFAULT_STAGE_TIMEOUT_MS = 30 * 60 * 1000

type Env = Record<string, string | undefined>

function readNumber(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw == null || raw.trim() === '') return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) return fallback
  return Math.min(max, Math.max(min, parsed))
}

function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  return Math.round(readNumber(raw, fallback, min, max))
}

function readStageTimeouts(env: Env): Record<StageName, number> {
  const base = readInt(env.STAGE_TIMEOUT_MS, DEFAULT_STAGE_TIMEOUT_MS, 1000, 24 * 60 * 60 * 1000)
  const timeouts: Record<StageName, number> = {
    extract_audio: base,
    extract_frames: base,
    transcribe: base,
    ocr: base,
    integrate: base,
    summarize: base,
    generate_output: base,
  }
  for (const stage of STAGES) {
    const key = `STAGE_TIMEOUT_${stage.toUpperCase()}_MS`
    timeouts[stage] = readInt(env[key], base, 1000, 24 * 60 * 60 * 1000)
  }
  return timeouts
}

export function resolveStoragePaths(root: string): StoragePaths {
  const resolved = path.resolve(root)
  return {
    root: resolved,
    inputDir: path.join(resolved, 'input'),
    processingDir: path.join(resolved, 'processing'),
    outputDir: path.join(resolved, 'output'),
  }
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const language = env.TRANSCRIBE_LANGUAGE?.trim()
  return {
    maxConcurrentJobs: readInt(env.MAX_CONCURRENT_JOBS, DEFAULT_MAX_CONCURRENT_JOBS, 1, 32),
    sceneDetectThreshold: readNumber(env.SCENE_DETECT_THRESHOLD, DEFAULT_SCENE_DETECT_THRESHOLD, 0, 1),
    frameSimilarityThreshold: readInt(env.FRAME_SIMILARITY_THRESHOLD, DEFAULT_FRAME_SIMILARITY_THRESHOLD, 0, 64),
    transcribeLanguage: language ? language : undefined,
    summaryMaxInputTokens: readInt(env.SUMMARY_MAX_INPUT_TOKENS, DEFAULT_SUMMARY_MAX_INPUT_TOKENS, 100, 1_000_000),
    stageTimeoutsMs: readStageTimeouts(env),
    storage: resolveStoragePaths(env.STORAGE_ROOT?.trim() || './storage'),
    jobStore: env.JOB_STORE?.trim().toLowerCase() === 'memory' ? 'memory' : 'redis',
    redisUrl: env.REDIS_URL?.trim() || 'redis://localhost:6379',
    openai: {
      transcribeModel: env.OPENAI_TRANSCRIBE_MODEL?.trim() || 'whisper-1',
      ocrModel: env.OPENAI_OCR_MODEL?.trim() || 'gpt-4o-mini',
      summaryModel: env.OPENAI_SUMMARY_MODEL?.trim() || 'gpt-4o-mini',
    },
  }
}
