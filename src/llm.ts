import { Ollama } from 'ollama'
import { runCLI } from './interfaces/process'
import { createLogger, preview } from './logger'

const log = createLogger('llm')

const modelSettings: Record<string, { maxContext: number }> = {
  llama3: {
    maxContext: 8192
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'llama3.2': {
    maxContext: 128000
  },
  'gpt-oss:20b': {
    maxContext: 32000
  }
}

const MODEL_MAX_CTX = 128000

export type LLMResponse = {
  success: boolean
  data?: string
  error?: string
}

export type Provider = 'ollama' | 'ollama-cli'

export const PROVIDERS: readonly Provider[] = ['ollama', 'ollama-cli']

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value)
}

/**
 * The remote text-generation service. Implementations never throw: a failed call resolves
 * with `success: false`. A blank `data` is passed through as-is.
 */
export interface TextBackend {
  generate(model: string, prompt: string, signal?: AbortSignal): Promise<LLMResponse>
}

export function contextWindowFor(model: string): number {
  return modelSettings[model]?.maxContext || MODEL_MAX_CTX
}

async function callOllama(client: Ollama, prompt: string, model: string, signal?: AbortSignal): Promise<string> {
  signal?.throwIfAborted()
  const response = await client.generate({
    model,
    prompt,
    stream: true,
    options: {
      num_ctx: contextWindowFor(model)
    }
  })

  // the signal may have fired while the model was still loading or evaluating the prompt
  if (signal?.aborted) {
    response.abort()
    signal.throwIfAborted()
  }

  const onAbort = () => response.abort()
  signal?.addEventListener('abort', onAbort, { once: true })
  try {
    let fullMessage = ''
    for await (const chunk of response) {
      if (chunk.response) {
        fullMessage += chunk.response
      }
    }
    return fullMessage
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}

async function callOllamaCLI(prompt: string, model: string, signal?: AbortSignal): Promise<string> {
  // The prompt goes through stdin: transcripts are too long for a positional argument.
  return runCLI('ollama', ['run', model], prompt, signal)
}

export type CallOptions = {
  provider?: Provider
  model?: string
  client?: Ollama
  signal?: AbortSignal
}

/**
 * callLLM - single request to the configured provider.
 * Retrying is left to the callers, which each own their retry policy.
 */
export async function callLLM(prompt: string, opts: CallOptions = {}): Promise<LLMResponse> {
  const provider = opts.provider ?? 'ollama'
  const model = opts.model ?? 'llama3.2'
  const tokenCount = prompt.length / 4 // rough estimate

  log.debug('LLM token count', tokenCount)
  if (tokenCount > contextWindowFor(model)) {
    log.warn(
      `LLM prompt token count (${tokenCount}) exceeds model max context (${contextWindowFor(model)}). Prompt may be truncated or rejected.`
    )
  }

  try {
    let raw = ''
    if (provider === 'ollama') {
      raw = await callOllama(opts.client ?? new Ollama(), prompt, model, opts.signal)
    } else {
      raw = await callOllamaCLI(prompt, model, opts.signal)
    }
    log.debug('LLM raw response', preview(raw))
    return { success: true, data: raw }
  } catch (err) {
    log.debug(`LLM call to ${provider}/${model} failed`, err)
    return { success: false, error: err instanceof Error ? err.message : String(err) }
  }
}

export function createBackend(opts: { provider: Provider; host: string }): TextBackend {
  const client = new Ollama({ host: opts.host })
  return {
    generate: (model, prompt, signal) => callLLM(prompt, { provider: opts.provider, model, client, signal })
  }
}
