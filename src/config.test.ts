import { describe, expect, it } from 'vitest'
import { configFromEnv, defaultConfig, mergeConfig } from './config'

describe('mergeConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(mergeConfig()).toBe(defaultConfig)
  })

  it('merges nested sections field by field', () => {
    const config = mergeConfig({ fanOut: { poolSize: 2 }, topicExtraction: { retryDelayMs: 0 } })
    expect(config.fanOut).toEqual({ poolSize: 2, taskTimeoutMs: 300000 })
    expect(config.topicExtraction).toEqual({ maxAttempts: 3, retryDelayMs: 0 })
    expect(config.fallback).toEqual({ plainTextFillerLimit: 500, emergencyTranscriptLimit: 5000 })
  })

  it('keeps an explicit false flag', () => {
    expect(mergeConfig({ spellCorrection: false }).spellCorrection).toBe(false)
  })
})

describe('configFromEnv', () => {
  it('reads overrides from the environment', () => {
    const config = mergeConfig(
      configFromEnv({
        LLM_PROVIDER: 'ollama-cli',
        OLLAMA_HOST: 'http://ollama.test:11434',
        OLLAMA_MODEL: 'llama3',
        TOPIC_MAX_ATTEMPTS: '5',
        NOTES_POOL_SIZE: '8',
        NOTES_TOPIC_TIMEOUT_MS: '1000',
        SPELL_CORRECTION: 'off'
      })
    )
    expect(config.provider).toBe('ollama-cli')
    expect(config.ollamaHost).toBe('http://ollama.test:11434')
    expect(config.model).toBe('llama3')
    expect(config.topicExtraction.maxAttempts).toBe(5)
    expect(config.fanOut).toEqual({ poolSize: 8, taskTimeoutMs: 1000 })
    expect(config.spellCorrection).toBe(false)
  })

  it('ignores values it cannot parse', () => {
    const config = mergeConfig(
      configFromEnv({
        LLM_PROVIDER: 'openai',
        TOPIC_MAX_ATTEMPTS: 'three',
        CONTENT_MAX_ATTEMPTS: '0',
        NOTES_POOL_SIZE: '2.5',
        OLLAMA_MODEL: '  '
      })
    )
    expect(config.provider).toBe('ollama')
    expect(config.topicExtraction.maxAttempts).toBe(3)
    expect(config.content.maxAttempts).toBe(2)
    expect(config.fanOut.poolSize).toBe(5)
    expect(config.model).toBe('llama3.2')
  })

  it('treats any other flag value as on', () => {
    expect(configFromEnv({ SPELL_CORRECTION: 'yes' }).spellCorrection).toBe(true)
    expect(configFromEnv({}).spellCorrection).toBeUndefined()
  })
})
