import { configFromEnv, mergeConfig, NotesConfig } from './config'
import { createBackend, TextBackend } from './llm'
import { NotesPipeline } from './notes/cascade'
import { WorkerPool } from './notes/workerPool'
import { createYoutubeSource, TranscriptSource } from './transcript/youtube'

export type Runtime = {
  config: NotesConfig
  backend: TextBackend
  pool: WorkerPool
  pipeline: NotesPipeline
  transcripts: TranscriptSource
}

/** Builds the long-lived collaborators once per process. The caller owns pool shutdown. */
export function createRuntime(config: NotesConfig = mergeConfig(configFromEnv())): Runtime {
  const backend = createBackend({ provider: config.provider, host: config.ollamaHost })
  const pool = new WorkerPool(config.fanOut.poolSize)
  return {
    config,
    backend,
    pool,
    pipeline: new NotesPipeline({ backend, pool, config }),
    transcripts: createYoutubeSource(config.whisperModel)
  }
}
