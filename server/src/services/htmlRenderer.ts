import { mkdir, readFile, rm, writeFile } from 'fs/promises'
import path from 'path'
import { RenderError, errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'
import type { Chapter, UnifiedTranscript } from '../models/Transcript'
import { assertPathWithinDir } from '../utils/assertPathWithinDir'
import { sanitizeFilename } from '../utils/sanitizeFilename'
import { formatDuration, formatTimestamp } from '../utils/timestamps'
import { imageDataUri } from './ocr'
import type { DocumentRenderer, RenderOptions } from './collaborators'

const log = getLogger('worker')

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Paragraph per blank-line block, <br> for single line breaks. */
function paragraphs(text: string): string {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => `<p>${escapeHtml(p).replace(/\n/g, '<br>')}</p>`)
    .join('\n')
}

function chapterRange(chapter: Chapter, durationSec: number): string {
  const end = Number.isFinite(chapter.end) ? chapter.end : durationSec
  return `${chapter.timestampDisplay} - ${formatTimestamp(Math.max(end, chapter.start))}`
}

const STYLE = `
body { font-family: system-ui, sans-serif; max-width: 960px; margin: 0 auto; padding: 2rem; line-height: 1.6; color: #222; }
header { border-bottom: 1px solid #ddd; margin-bottom: 1.5rem; }
.meta { color: #666; font-size: 0.9rem; }
nav ol { padding-left: 1.5rem; }
section.chapter { border-top: 1px solid #eee; padding-top: 1rem; margin-top: 2rem; }
section.chapter img { max-width: 100%; border: 1px solid #ddd; }
.ocr { background: #f6f6f6; padding: 0.75rem; white-space: pre-wrap; font-family: ui-monospace, monospace; font-size: 0.85rem; }
.summary { font-weight: 500; }
`

export interface StudyDocumentInput {
  title: string
  transcript: UnifiedTranscript
  /** `src` for a chapter's frame image, or undefined to leave it out. */
  imageSrc?: (chapter: Chapter) => string | undefined
}

/** Single-file HTML study document. All text content is escaped. */
export function renderStudyDocument({ title, transcript, imageSrc }: StudyDocumentInput): string {
  const { metadata, chapters } = transcript
  const toc = chapters
    .map((c) => `<li><a href="#chapter-${c.index}">${escapeHtml(c.timestampDisplay)}</a></li>`)
    .join('\n')

  const sections = chapters.map((chapter) => {
    const src = imageSrc?.(chapter)
    const parts = [
      `<section class="chapter" id="chapter-${chapter.index}">`,
      `<h2>${escapeHtml(chapterRange(chapter, metadata.durationSec))}</h2>`,
    ]
    if (src) parts.push(`<img src="${escapeHtml(src)}" alt="Frame at ${escapeHtml(chapter.timestampDisplay)}">`)
    if (chapter.summary) parts.push(`<div class="summary">${paragraphs(chapter.summary)}</div>`)
    if (chapter.ocrText) parts.push(`<pre class="ocr">${escapeHtml(chapter.ocrText)}</pre>`)
    if (chapter.speechText) {
      parts.push(`<details><summary>Transcript</summary>${paragraphs(chapter.speechText)}</details>`)
    }
    parts.push('</section>')
    return parts.join('\n')
  })

  const meta = [
    `Source: ${escapeHtml(metadata.sourceFile)}`,
    `Duration: ${formatDuration(metadata.durationSec)}`,
    `Chapters: ${chapters.length}`,
  ]
  if (metadata.language) meta.push(`Language: ${escapeHtml(metadata.language)}`)

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLE}</style>`,
    '</head>',
    '<body>',
    '<header>',
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="meta">${meta.join(' | ')}</p>`,
    '</header>',
    transcript.overallSummary ? `<section class="overview"><h2>Overview</h2>${paragraphs(transcript.overallSummary)}</section>` : '',
    `<nav><h2>Contents</h2><ol>\n${toc}\n</ol></nav>`,
    ...sections,
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

export interface HtmlDocumentRendererOptions {
  outputDir: string
  /** Embed frame images as Base64 data URIs (default) or leave them out. */
  embedImages?: boolean
}

export class HtmlDocumentRenderer implements DocumentRenderer {
  private readonly outputDir: string
  private readonly embedImages: boolean

  constructor(options: HtmlDocumentRendererOptions) {
    this.outputDir = options.outputDir
    this.embedImages = options.embedImages ?? true
  }

  async render(transcript: UnifiedTranscript, options: RenderOptions): Promise<string> {
    try {
      const images = this.embedImages ? await this.loadImages(transcript.chapters) : new Map<number, string>()
      const html = renderStudyDocument({
        title: options.title,
        transcript,
        imageSrc: (chapter) => images.get(chapter.index),
      })
      await mkdir(this.outputDir, { recursive: true })
      const fileName = `${sanitizeFilename(options.title, 'document').replace(/\s+/g, '_')}_${sanitizeFilename(options.jobId)}.html`
      const outputPath = path.join(this.outputDir, fileName)
      await writeFile(outputPath, html, 'utf8')
      log.info({ msg: 'document rendered', jobId: options.jobId, file: fileName, chapters: transcript.chapters.length })
      return outputPath
    } catch (err) {
      throw new RenderError(`Rendering failed: ${errorMessage(err)}`, { cause: err })
    }
  }

  /** Only documents under the output directory are removed. */
  async remove(documentPath: string): Promise<void> {
    assertPathWithinDir(this.outputDir, documentPath)
    await rm(documentPath, { force: true })
    log.info({ msg: 'document removed', file: path.basename(documentPath) })
  }

  private async loadImages(chapters: Chapter[]): Promise<Map<number, string>> {
    const images = new Map<number, string>()
    for (const chapter of chapters) {
      if (!chapter.frameImage) continue
      try {
        images.set(chapter.index, imageDataUri(chapter.frameImage, await readFile(chapter.frameImage)))
      } catch (err) {
        log.warn({ msg: 'frame image unreadable, rendering chapter without it', chapter: chapter.index, err })
      }
    }
    return images
  }
}
