import type { StageName } from '../models/Job'

/**
 * Base class for every failure raised while a pipeline stage runs.
 * The scheduler records `message` on the job and halts that job only.
 */
export class StageError extends Error {
  readonly stage: StageName

  constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StageError'
    this.stage = stage
  }
}

export class ExtractionError extends StageError {
  constructor(message: string, stage: 'extract_audio' | 'extract_frames' = 'extract_frames', options?: { cause?: unknown }) {
    super(stage, message, options)
    this.name = 'ExtractionError'
  }
}

export class TranscriptionError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transcribe', message, options)
    this.name = 'TranscriptionError'
  }
}

export class OCRError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ocr', message, options)
    this.name = 'OCRError'
  }
}

export class IntegrationError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('integrate', message, options)
    this.name = 'IntegrationError'
  }
}

/** A video with zero extracted frames cannot be chaptered. */
export class EmptyInputError extends IntegrationError {
  constructor(message = 'Cannot integrate: no key frames were extracted') {
    super(message)
    this.name = 'EmptyInputError'
  }
}

export class SummarizationError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('summarize', message, options)
    this.name = 'SummarizationError'
  }
}

export class BudgetExceededError extends SummarizationError {
  readonly size: number
  readonly budget: number

  constructor(size: number, budget: number, message?: string) {
    super(message ?? `Summarizer input of ${size} tokens exceeds budget of ${budget}`)
    this.name = 'BudgetExceededError'
    this.size = size
    this.budget = budget
  }
}

export class RenderError extends StageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generate_output', message, options)
    this.name = 'RenderError'
  }
}

/** cancel/retry/delete requested on a job that is not eligible. Nothing is mutated. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}

export class NotReadyError extends Error {
  constructor(jobId: string, status: string) {
    super(`Result for job ${jobId} is not ready (status: ${status})`)
    this.name = 'NotReadyError'
  }
}

export class JobNotFoundError extends Error {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`)
    this.name = 'JobNotFoundError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return 'Unknown error'
}

/**
 * Wrap anything thrown by a stage into that stage's error class so the job
 * record always carries a StageError.
 */
export function toStageError(stage: StageName, err: unknown): StageError {
  if (err instanceof StageError) return err
  const message = errorMessage(err)
  switch (stage) {
    case 'extract_audio':
    case 'extract_frames':
      return new ExtractionError(message, stage, { cause: err })
    case 'transcribe':
      return new TranscriptionError(message, { cause: err })
    case 'ocr':
      return new OCRError(message, { cause: err })
    case 'integrate':
      return new IntegrationError(message, { cause: err })
    case 'summarize':
      return new SummarizationError(message, { cause: err })
    case 'generate_output':
      return new RenderError(message, { cause: err })
  }
}
