export type PipelineErrorKind =
  | 'BackendUnavailable'
  | 'MalformedOutput'
  | 'NoTopicsExtracted'
  | 'ContentGenerationExhausted'
  | 'TotalPipelineFailure'

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind
}

/** Empty or failed response from the generation backend. Always retried locally. */
export class BackendUnavailableError extends PipelineError {
  readonly kind = 'BackendUnavailable'
  name = 'BackendUnavailableError'
}

/** Model output that could not be repaired or mapped onto the expected shape. */
export class MalformedOutputError extends PipelineError {
  readonly kind = 'MalformedOutput'
  name = 'MalformedOutputError'
}

export class NoTopicsExtractedError extends PipelineError {
  readonly kind = 'NoTopicsExtracted'
  name = 'NoTopicsExtractedError'
}

export class ContentGenerationExhaustedError extends PipelineError {
  readonly kind = 'ContentGenerationExhausted'
  name = 'ContentGenerationExhaustedError'

  /** The most recent non-blank response, if any attempt produced one. */
  constructor(
    message: string,
    readonly lastResponse?: string,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class TotalPipelineFailureError extends PipelineError {
  readonly kind = 'TotalPipelineFailure'
  name = 'TotalPipelineFailureError'
}

export class TaskTimeoutError extends Error {
  name = 'TaskTimeoutError'
  constructor(readonly timeoutMs: number) {
    super(`Task timed out after ${timeoutMs}ms`)
  }
}

export class PoolClosedError extends Error {
  name = 'PoolClosedError'
  constructor() {
    super('Worker pool is shut down')
  }
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  if (typeof e === 'string') return e
  try {
    return JSON.stringify(e) ?? String(e)
  } catch {
    // circular or BigInt-bearing values
    return String(e)
  }
}
