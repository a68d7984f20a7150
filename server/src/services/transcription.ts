import OpenAI from 'openai'
import fs from 'fs'
import path from 'path'
import { mkdtemp, rm } from 'fs/promises'
import { TranscriptionError, errorMessage } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import type { SpeechSegment } from '../models/Transcript'
import type { CallOptions, Transcriber, TranscriptionOutput } from './collaborators'
import { getMediaDuration, splitAudioIntoChunks } from './ffmpeg'

const log = getLogger('worker')

/** Audio this long or longer is transcribed in chunks (seconds). */
const CHUNK_THRESHOLD_SEC = 150
/** Whisper uploads are capped at 25MB; 180 s of 16 kHz mono PCM is ~5.8MB. */
const CHUNK_DURATION_SEC = 180

interface VerboseTranscription {
  segments: SpeechSegment[]
  language?: string
  durationSec?: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Reads a `verbose_json` response. Segment times are shifted by `offsetSec`;
 * segments with no text are dropped.
 */
export function parseVerboseTranscription(raw: unknown, offsetSec = 0): VerboseTranscription {
  if (!isRecord(raw)) {
    throw new TranscriptionError('Transcription response is not an object')
  }
  const segments: SpeechSegment[] = []
  const rawSegments = Array.isArray(raw.segments) ? raw.segments : []
  for (const s of rawSegments) {
    if (!isRecord(s)) continue
    const start = Number(s.start)
    const end = Number(s.end)
    const text = typeof s.text === 'string' ? s.text.trim() : ''
    if (!text || !Number.isFinite(start) || !Number.isFinite(end)) continue
    segments.push({ start: start + offsetSec, end: end + offsetSec, text })
  }
  return {
    segments,
    language: typeof raw.language === 'string' ? raw.language : undefined,
    durationSec: typeof raw.duration === 'number' ? raw.duration + offsetSec : undefined,
  }
}

export interface WhisperTranscriberOptions {
  model: string
  client?: OpenAI
}

/** Speech-to-text through the OpenAI transcription endpoint with segment timestamps. */
export class WhisperTranscriber implements Transcriber {
  private readonly client: OpenAI
  private readonly model: string

  constructor(options: WhisperTranscriberOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: process.env.OPENAI_API_KEY })
    this.model = options.model
  }

  async transcribe(audioPath: string, options: CallOptions & { language?: string }): Promise<TranscriptionOutput> {
    try {
      const durationSec = await getMediaDuration(audioPath)
      if (durationSec < CHUNK_THRESHOLD_SEC) {
        const result = await this.transcribeFile(audioPath, 0, options)
        return { ...result, durationSec }
      }
      const result = await this.transcribeChunked(audioPath, options)
      log.info({ msg: 'chunked transcription finished', file: redactFilePath(audioPath), segments: result.segments.length })
      return { ...result, durationSec }
    } catch (err) {
      if (err instanceof TranscriptionError) throw err
      throw new TranscriptionError(`Transcription failed: ${errorMessage(err)}`, { cause: err })
    }
  }

  private async transcribeFile(
    filePath: string,
    offsetSec: number,
    options: CallOptions & { language?: string }
  ): Promise<VerboseTranscription> {
    const raw: unknown = await this.client.audio.transcriptions.create({
      file: fs.createReadStream(filePath),
      model: this.model,
      response_format: 'verbose_json',
      timestamp_granularities: ['segment'],
      language: options.language || undefined,
    }, { signal: options.signal })
    return parseVerboseTranscription(raw, offsetSec)
  }

  private async transcribeChunked(
    audioPath: string,
    options: CallOptions & { language?: string }
  ): Promise<VerboseTranscription> {
    const chunkDir = await mkdtemp(path.join(path.dirname(audioPath), 'chunks-'))
    try {
      const chunkPaths = await splitAudioIntoChunks(audioPath, CHUNK_DURATION_SEC, chunkDir, options.signal)
      const results = await Promise.all(
        chunkPaths.map((chunkPath, i) => this.transcribeFile(chunkPath, i * CHUNK_DURATION_SEC, options))
      )
      return {
        segments: results.flatMap((r) => r.segments).sort((a, b) => a.start - b.start),
        language: results.find((r) => r.language)?.language,
      }
    } finally {
      await rm(chunkDir, { recursive: true, force: true })
    }
  }
}
