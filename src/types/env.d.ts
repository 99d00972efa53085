declare namespace NodeJS {
  interface ProcessEnv {
    LLM_PROVIDER?: string
    OLLAMA_HOST?: string
    OLLAMA_MODEL?: string
    TOPIC_MAX_ATTEMPTS?: string
    TOPIC_RETRY_DELAY_MS?: string
    CONTENT_MAX_ATTEMPTS?: string
    NOTES_POOL_SIZE?: string
    NOTES_TOPIC_TIMEOUT_MS?: string
    NOTES_SHUTDOWN_GRACE_MS?: string
    SPELL_CORRECTION?: string
    WHISPER_MODEL?: string
    PORT?: string
    DEV_LOG?: string
  }
}
