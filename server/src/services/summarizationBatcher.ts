/**
 * Map-reduce summarization under a fixed input budget.
 *
 * A chapter within budget is summarized with one call. A larger chapter is cut
 * into contiguous sub-blocks at unit boundaries (OCR text first, then each speech
 * segment), every sub-block is summarized, and the newline-joined sub-summaries
 * are summarized once more. Depth is exactly two: if the joined sub-summaries are
 * still over budget, BudgetExceededError is thrown.
 */
import { BudgetExceededError } from '../lib/errors'
import type { Chapter } from '../models/Transcript'
import type { Summarizer } from './collaborators'

export type TokenCounter = (text: string) => number

/** Rough chars-per-token estimate; good enough to stay under model limits. */
export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4)

export interface OversizedUnitEvent {
  type: 'oversized_unit'
  /** null for the overall summary. */
  chapterIndex: number | null
  unitIndex: number
  tokens: number
  budget: number
}

export type BatcherEvent = OversizedUnitEvent

export interface BatcherOptions {
  countTokens?: TokenCounter
  onEvent?: (event: BatcherEvent) => void
  signal?: AbortSignal
}

interface BatchContext {
  budget: number
  summarizer: Summarizer
  countTokens: TokenCounter
  onEvent?: (event: BatcherEvent) => void
  chapterIndex: number | null
  signal?: AbortSignal
}

const UNIT_SEPARATOR = '\n'

function nonEmpty(texts: string[]): string[] {
  return texts.map((t) => t.trim()).filter((t) => t.length > 0)
}

/** OCR text first, then each speech segment, in order. */
export function chapterUnits(chapter: Chapter): string[] {
  return nonEmpty([chapter.ocrText, ...chapter.speechSegments.map((s) => s.text)])
}

export function chapterText(chapter: Chapter): string {
  return nonEmpty([chapter.ocrText, chapter.speechText]).join(UNIT_SEPARATOR)
}

export interface PackedBlock {
  text: string
  unitCount: number
  oversized: boolean
}

/**
 * Greedy contiguous packing. A unit is never split; one that alone exceeds the
 * budget becomes its own block, flagged `oversized`.
 */
export function packUnits(units: string[], budget: number, countTokens: TokenCounter = estimateTokens): PackedBlock[] {
  const blocks: PackedBlock[] = []
  let current: PackedBlock | null = null
  for (const unit of units) {
    if (countTokens(unit) > budget) {
      if (current) blocks.push(current)
      blocks.push({ text: unit, unitCount: 1, oversized: true })
      current = null
      continue
    }
    if (current) {
      const candidate: string = current.text + UNIT_SEPARATOR + unit
      if (countTokens(candidate) <= budget) {
        current = { text: candidate, unitCount: current.unitCount + 1, oversized: false }
        continue
      }
      blocks.push(current)
    }
    current = { text: unit, unitCount: 1, oversized: false }
  }
  if (current) blocks.push(current)
  return blocks
}

async function summarizeWithinBudget(text: string, units: string[], ctx: BatchContext): Promise<string> {
  const { budget, summarizer, countTokens, signal } = ctx
  if (countTokens(text) <= budget) {
    return (await summarizer.summarize(text, budget, { signal })).trim()
  }

  const blocks = packUnits(units, budget, countTokens)
  let unitIndex = 0
  for (const block of blocks) {
    if (block.oversized) {
      ctx.onEvent?.({
        type: 'oversized_unit',
        chapterIndex: ctx.chapterIndex,
        unitIndex,
        tokens: countTokens(block.text),
        budget,
      })
    }
    unitIndex += block.unitCount
  }

  const partials: string[] = []
  for (const block of blocks) {
    partials.push((await summarizer.summarize(block.text, budget, { signal })).trim())
  }

  const joined = partials.join(UNIT_SEPARATOR)
  const size = countTokens(joined)
  if (size > budget) {
    const scope = ctx.chapterIndex === null ? 'overall summary' : `chapter ${ctx.chapterIndex}`
    throw new BudgetExceededError(
      size,
      budget,
      `Reduce input for ${scope} is ${size} tokens, over the budget of ${budget}`
    )
  }
  return (await summarizer.summarize(joined, budget, { signal })).trim()
}

/**
 * Returns new chapters with `summary` filled in. Chapters with neither speech nor
 * OCR text are not sent and keep an empty summary. Calls are made one at a time
 * in chapter order.
 */
export async function summarizeChapters(
  chapters: Chapter[],
  maxInputTokens: number,
  summarizer: Summarizer,
  options: BatcherOptions = {}
): Promise<Chapter[]> {
  const countTokens = options.countTokens ?? estimateTokens
  const result: Chapter[] = []
  for (const chapter of chapters) {
    const text = chapterText(chapter)
    if (!text) {
      result.push({ ...chapter, summary: '' })
      continue
    }
    const summary = await summarizeWithinBudget(text, chapterUnits(chapter), {
      budget: maxInputTokens,
      summarizer,
      countTokens,
      onEvent: options.onEvent,
      chapterIndex: chapter.index,
      signal: options.signal,
    })
    result.push({ ...chapter, summary })
  }
  return result
}

/** One summary of the whole video from the `[MM:SS] summary` line of each chapter. */
export async function summarizeOverall(
  chapters: Chapter[],
  maxInputTokens: number,
  summarizer: Summarizer,
  options: BatcherOptions = {}
): Promise<string> {
  const lines = chapters
    .filter((c) => c.summary.trim().length > 0)
    .map((c) => `[${c.timestampDisplay}] ${c.summary.trim()}`)
  if (lines.length === 0) return ''
  return summarizeWithinBudget(lines.join(UNIT_SEPARATOR), lines, {
    budget: maxInputTokens,
    summarizer,
    countTokens: options.countTokens ?? estimateTokens,
    onEvent: options.onEvent,
    chapterIndex: null,
    signal: options.signal,
  })
}
