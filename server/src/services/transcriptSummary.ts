import OpenAI from 'openai'
import { BudgetExceededError, SummarizationError, errorMessage } from '../lib/errors'
import type { CallOptions, Summarizer } from './collaborators'
import { estimateTokens, type TokenCounter } from './summarizationBatcher'

const SYSTEM_PROMPT =
  'You summarize sections of recorded lectures and talks for study notes. Reply with a concise 2-3 sentence summary in the language of the input. Output plain text only, no markdown.'

export interface OpenAiSummarizerOptions {
  model: string
  client?: OpenAI
  countTokens?: TokenCounter
  maxOutputTokens?: number
}

/** Chat-completion summarizer. Input over the budget is refused, never truncated. */
export class OpenAiSummarizer implements Summarizer {
  private readonly client: OpenAI
  private readonly model: string
  private readonly countTokens: TokenCounter
  private readonly maxOutputTokens: number

  constructor(options: OpenAiSummarizerOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: process.env.OPENAI_API_KEY })
    this.model = options.model
    this.countTokens = options.countTokens ?? estimateTokens
    this.maxOutputTokens = options.maxOutputTokens ?? 400
  }

  async summarize(text: string, budget: number, options: CallOptions = {}): Promise<string> {
    const size = this.countTokens(text)
    if (size > budget) throw new BudgetExceededError(size, budget)
    if (!text.trim()) return ''

    let content: string | null | undefined
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.3,
        max_tokens: this.maxOutputTokens,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: text },
        ],
      }, { signal: options.signal })
      content = completion.choices[0]?.message?.content
    } catch (err) {
      throw new SummarizationError(`Summarization request failed: ${errorMessage(err)}`, { cause: err })
    }
    if (!content?.trim()) {
      throw new SummarizationError('Summarizer returned an empty response')
    }
    return content.trim()
  }
}
