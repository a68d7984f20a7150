/** Segment from the transcriber. Ordered by `start`; `end > start`. */
export interface SpeechSegment {
  start: number
  end: number
  text: string
}

/** Key frame as returned by the extractor, before OCR. */
export interface ExtractedFrame {
  timestamp: number
  imagePath: string
}

/** Key frame with its OCR text. Timestamps strictly increase after deduplication. */
export interface FrameRecord extends ExtractedFrame {
  ocrText: string
}

export interface Chapter {
  index: number
  start: number
  /** Infinity for the last chapter (serialized as null). */
  end: number
  timestampDisplay: string
  frame: FrameRecord
  frameImage: string
  ocrText: string
  speechSegments: SpeechSegment[]
  speechText: string
  summary: string
}

export interface UnifiedTranscriptMetadata {
  sourceFile: string
  durationSec: number
  totalFramesExtracted: number
  language?: string
}

export interface UnifiedTranscript {
  metadata: UnifiedTranscriptMetadata
  chapters: Chapter[]
  overallSummary: string
}

export function getWordCount(transcript: UnifiedTranscript): number {
  return transcript.chapters.reduce(
    (sum, c) => sum + c.speechText.split(/\s+/).filter(Boolean).length,
    0
  )
}
