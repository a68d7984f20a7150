/**
 * Contracts of the external capabilities the pipeline sequences. The workers
 * only see these interfaces; the ffmpeg/OpenAI/HTML adapters implement them.
 */
import type { ExtractedFrame, SpeechSegment, UnifiedTranscript } from '../models/Transcript'

export interface AudioExtraction {
  /** 16 kHz mono PCM WAV. */
  audioPath: string
  durationSec: number
}

/** Aborted when the stage times out; long-running calls stop their work. */
export interface CallOptions {
  signal?: AbortSignal
}

export interface KeyframeOptions extends CallOptions {
  sceneThreshold: number
  /** Hamming distance below which two frames count as the same slide. */
  similarityThreshold: number
}

export interface MediaExtractor {
  extractAudio(videoPath: string, outputDir: string, options?: CallOptions): Promise<AudioExtraction>
  /** Ordered by timestamp, near-duplicates removed. */
  extractKeyframes(videoPath: string, outputDir: string, options: KeyframeOptions): Promise<ExtractedFrame[]>
}

export interface TranscriptionOutput {
  segments: SpeechSegment[]
  language?: string
  durationSec?: number
}

export interface Transcriber {
  transcribe(audioPath: string, options: CallOptions & { language?: string }): Promise<TranscriptionOutput>
}

export interface OcrEngine {
  /** Text visible in the image; an empty string is a valid answer. */
  recognize(imagePath: string, options?: CallOptions): Promise<string>
}

export interface Summarizer {
  /** Throws BudgetExceededError when `text` is larger than `budget` tokens. */
  summarize(text: string, budget: number, options?: CallOptions): Promise<string>
}

export interface RenderOptions {
  jobId: string
  title: string
}

export interface DocumentRenderer {
  /** Returns a handle (path) to the rendered document. */
  render(transcript: UnifiedTranscript, options: RenderOptions): Promise<string>
  /** Deletes a document returned by `render`; a missing document is not an error. */
  remove(documentPath: string): Promise<void>
}

export interface Collaborators {
  extractor: MediaExtractor
  transcriber: Transcriber
  ocr: OcrEngine
  summarizer: Summarizer
  renderer: DocumentRenderer
}
