import OpenAI from 'openai'
import { readFile } from 'fs/promises'
import path from 'path'
import { OCRError, errorMessage } from '../lib/errors'
import type { CallOptions, OcrEngine } from './collaborators'

const IMAGE_MIME: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
}

export const NO_TEXT_MARKER = '<none>'

const OCR_PROMPT = `Transcribe every piece of text visible in this video frame (slides, code, captions, whiteboard), preserving line breaks. Output only the text. If there is no text, output ${NO_TEXT_MARKER}.`

export function imageDataUri(imagePath: string, bytes: Buffer): string {
  const mime = IMAGE_MIME[path.extname(imagePath).toLowerCase()] ?? 'image/jpeg'
  return `data:${mime};base64,${bytes.toString('base64')}`
}

/** Model reply to OCR text; the no-text marker and blank replies become ''. */
export function normalizeOcrReply(reply: string | null | undefined): string {
  const text = (reply ?? '').trim()
  return text === NO_TEXT_MARKER ? '' : text
}

export interface VisionOcrEngineOptions {
  model: string
  client?: OpenAI
}

/** Frame OCR through a vision-capable chat model. */
export class VisionOcrEngine implements OcrEngine {
  private readonly client: OpenAI
  private readonly model: string

  constructor(options: VisionOcrEngineOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: process.env.OPENAI_API_KEY })
    this.model = options.model
  }

  async recognize(imagePath: string, options: CallOptions = {}): Promise<string> {
    try {
      const bytes = await readFile(imagePath)
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: OCR_PROMPT },
              { type: 'image_url', image_url: { url: imageDataUri(imagePath, bytes), detail: 'high' } },
            ],
          },
        ],
      }, { signal: options.signal })
      return normalizeOcrReply(completion.choices[0]?.message?.content)
    } catch (err) {
      throw new OCRError(`OCR failed for ${path.basename(imagePath)}: ${errorMessage(err)}`, { cause: err })
    }
  }
}
