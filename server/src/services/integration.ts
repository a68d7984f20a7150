/**
 * Timestamp integration: merges ordered key frames and ordered speech segments
 * into chapters. Pure and deterministic; no I/O.
 *
 * Chapter i covers [frames[i].timestamp, frames[i+1].timestamp), the last one
 * [frames[last].timestamp, Infinity). A segment belongs to the chapter containing
 * its start, even when its end runs into the next chapter. Segments that start
 * before the first frame are clamped into chapter 0.
 *
 * Repeated frame timestamps: the last frame at a timestamp anchors the interval;
 * the frames before it become zero-length chapters [t, t) that never receive
 * speech. Chapters stay contiguous: chapters[i].end === chapters[i + 1].start.
 */
import { EmptyInputError } from '../lib/errors'
import type {
  Chapter,
  FrameRecord,
  SpeechSegment,
  UnifiedTranscript,
} from '../models/Transcript'
import { formatTimestamp } from '../utils/timestamps'

interface ChapterSlot {
  frame: FrameRecord
  start: number
  end: number
  zeroLength: boolean
}

function buildSlots(frames: FrameRecord[]): ChapterSlot[] {
  const slots: ChapterSlot[] = []
  let i = 0
  while (i < frames.length) {
    const t = frames[i].timestamp
    let j = i + 1
    while (j < frames.length && frames[j].timestamp <= t) j++
    // frames[i..j-1] share timestamp t: all but the last are zero-length.
    for (let k = i; k < j - 1; k++) {
      slots.push({ frame: frames[k], start: t, end: t, zeroLength: true })
    }
    const end = j < frames.length ? frames[j].timestamp : Infinity
    slots.push({ frame: frames[j - 1], start: t, end, zeroLength: false })
    i = j
  }
  return slots
}

export function joinSpeechText(segments: SpeechSegment[]): string {
  return segments
    .map((s) => s.text.trim())
    .filter(Boolean)
    .join(' ')
}

export function integrate(frames: FrameRecord[], segments: SpeechSegment[]): Chapter[] {
  if (frames.length === 0) {
    throw new EmptyInputError()
  }

  const slots = buildSlots(frames)
  const chapters: Chapter[] = []
  let cursor = 0

  for (const slot of slots) {
    const assigned: SpeechSegment[] = []
    if (!slot.zeroLength) {
      // Two-pointer merge: both inputs are sorted, so each segment is visited once.
      while (cursor < segments.length && segments[cursor].start < slot.end) {
        const seg = segments[cursor]
        assigned.push({ start: seg.start, end: seg.end, text: seg.text })
        cursor++
      }
    }

    chapters.push({
      index: chapters.length,
      start: slot.start,
      end: slot.end,
      timestampDisplay: formatTimestamp(slot.start),
      frame: { ...slot.frame },
      frameImage: slot.frame.imagePath,
      ocrText: slot.frame.ocrText,
      speechSegments: assigned,
      speechText: joinSpeechText(assigned),
      summary: '',
    })
  }

  return chapters
}

export interface BuildTranscriptInput {
  sourceFile: string
  durationSec: number
  language?: string
  frames: FrameRecord[]
  segments: SpeechSegment[]
}

export function buildUnifiedTranscript(input: BuildTranscriptInput): UnifiedTranscript {
  const chapters = integrate(input.frames, input.segments)
  return {
    metadata: {
      sourceFile: input.sourceFile,
      durationSec: input.durationSec,
      totalFramesExtracted: input.frames.length,
      language: input.language,
    },
    chapters,
    overallSummary: '',
  }
}

