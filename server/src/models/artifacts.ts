import type { ExtractedFrame, FrameRecord, SpeechSegment, UnifiedTranscript } from './Transcript'
import type { StageName } from './Job'

/** Output recorded for each stage once it completes. */
export interface StageArtifacts {
  extract_audio: { audioPath: string; durationSec: number }
  extract_frames: { frames: ExtractedFrame[] }
  transcribe: { segments: SpeechSegment[]; language?: string; durationSec?: number }
  ocr: { frames: FrameRecord[] }
  integrate: UnifiedTranscript
  summarize: UnifiedTranscript
  generate_output: { documentPath: string }
}

export type ArtifactOf<S extends StageName> = StageArtifacts[S]

/** JSON has no Infinity; the open end of the last chapter is stored as null. */
export function serializeArtifact(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (v === Infinity ? null : v), 2)
}

export function parseArtifact<S extends StageName>(raw: string): ArtifactOf<S> {
  return JSON.parse(raw, (key, v: unknown) => (key === 'end' && v === null ? Infinity : v))
}
