import os from 'node:os'
import path from 'node:path'
import { isProvider, Provider } from './llm'

export type NotesConfig = {
  provider: Provider
  ollamaHost: string
  model: string
  topicExtraction: {
    maxAttempts: number
    /** Fixed pause between attempts; a throttle for an overloaded backend, not exponential backoff. */
    retryDelayMs: number
  }
  content: {
    maxAttempts: number
  }
  fanOut: {
    poolSize: number
    taskTimeoutMs: number
  }
  fallback: {
    plainTextFillerLimit: number
    emergencyTranscriptLimit: number
  }
  spellCorrection: boolean
  shutdownGraceMs: number
  whisperModel: string
}

export type NotesConfigOverrides = Partial<{
  [K in keyof NotesConfig]: NotesConfig[K] extends object ? Partial<NotesConfig[K]> : NotesConfig[K]
}>

export const defaultConfig: NotesConfig = {
  provider: 'ollama',
  ollamaHost: 'http://127.0.0.1:11434',
  model: 'llama3.2',
  topicExtraction: {
    maxAttempts: 3,
    retryDelayMs: 2000
  },
  content: {
    maxAttempts: 2
  },
  fanOut: {
    poolSize: 5,
    taskTimeoutMs: 5 * 60 * 1000
  },
  fallback: {
    plainTextFillerLimit: 500,
    emergencyTranscriptLimit: 5000
  },
  spellCorrection: true,
  shutdownGraceMs: 60_000,
  whisperModel: path.join(os.homedir(), 'models/ggml-base.en.bin')
}

export function mergeConfig(partial?: NotesConfigOverrides): NotesConfig {
  if (!partial) return defaultConfig
  const d = defaultConfig
  return {
    provider: partial.provider ?? d.provider,
    ollamaHost: partial.ollamaHost ?? d.ollamaHost,
    model: partial.model ?? d.model,
    topicExtraction: {
      maxAttempts: partial.topicExtraction?.maxAttempts ?? d.topicExtraction.maxAttempts,
      retryDelayMs: partial.topicExtraction?.retryDelayMs ?? d.topicExtraction.retryDelayMs
    },
    content: {
      maxAttempts: partial.content?.maxAttempts ?? d.content.maxAttempts
    },
    fanOut: {
      poolSize: partial.fanOut?.poolSize ?? d.fanOut.poolSize,
      taskTimeoutMs: partial.fanOut?.taskTimeoutMs ?? d.fanOut.taskTimeoutMs
    },
    fallback: {
      plainTextFillerLimit: partial.fallback?.plainTextFillerLimit ?? d.fallback.plainTextFillerLimit,
      emergencyTranscriptLimit: partial.fallback?.emergencyTranscriptLimit ?? d.fallback.emergencyTranscriptLimit
    },
    spellCorrection: partial.spellCorrection ?? d.spellCorrection,
    shutdownGraceMs: partial.shutdownGraceMs ?? d.shutdownGraceMs,
    whisperModel: partial.whisperModel ?? d.whisperModel
  }
}

function intFrom(value: string | undefined, min: number): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const n = Number(value)
  return Number.isInteger(n) && n >= min ? n : undefined
}

function flagFrom(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase())
}

/** Reads overrides from the environment; unparsable values are ignored so the defaults stay in force. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): NotesConfigOverrides {
  const provider = env.LLM_PROVIDER?.trim()
  return {
    provider: provider && isProvider(provider) ? provider : undefined,
    ollamaHost: env.OLLAMA_HOST?.trim() || undefined,
    model: env.OLLAMA_MODEL?.trim() || undefined,
    topicExtraction: {
      maxAttempts: intFrom(env.TOPIC_MAX_ATTEMPTS, 1),
      retryDelayMs: intFrom(env.TOPIC_RETRY_DELAY_MS, 0)
    },
    content: {
      maxAttempts: intFrom(env.CONTENT_MAX_ATTEMPTS, 1)
    },
    fanOut: {
      poolSize: intFrom(env.NOTES_POOL_SIZE, 1),
      taskTimeoutMs: intFrom(env.NOTES_TOPIC_TIMEOUT_MS, 1)
    },
    spellCorrection: flagFrom(env.SPELL_CORRECTION),
    shutdownGraceMs: intFrom(env.NOTES_SHUTDOWN_GRACE_MS, 0),
    whisperModel: env.WHISPER_MODEL?.trim() || undefined
  }
}
