import assert from 'node:assert/strict'
import test from 'node:test'
import OpenAI from 'openai'
import { BudgetExceededError } from '../src/lib/errors'
import { OpenAiSummarizer } from '../src/services/transcriptSummary'

// Requests never leave the process: every case returns before the client is called.
const summarizer = new OpenAiSummarizer({
  model: 'gpt-4o-mini',
  client: new OpenAI({ apiKey: 'test-key' }),
})

test('input over the budget is refused before any request', async () => {
  await assert.rejects(summarizer.summarize('x'.repeat(40), 5), (err: unknown) => {
    assert.ok(err instanceof BudgetExceededError)
    assert.equal(err.size, 10)
    assert.equal(err.budget, 5)
    assert.equal(err.message, 'Summarizer input of 10 tokens exceeds budget of 5')
    return true
  })
})

test('blank input summarizes to an empty string', async () => {
  assert.equal(await summarizer.summarize('   \n ', 10), '')
})

test('a custom token counter decides the budget check', async () => {
  const strict = new OpenAiSummarizer({
    model: 'gpt-4o-mini',
    client: new OpenAI({ apiKey: 'test-key' }),
    countTokens: (text) => text.split(/\s+/).filter(Boolean).length,
  })
  await assert.rejects(strict.summarize('one two three', 2), BudgetExceededError)
})
