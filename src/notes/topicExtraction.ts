import { TextBackend } from '../llm'
import { createLogger, preview } from '../logger'
import { requestText, sleep } from './backend'
import { MalformedOutputError, NoTopicsExtractedError, PipelineError, Result } from './errors'
import { mapTopicList } from './mapper'
import { topicExtractionPrompt } from './prompts'
import { repairJson } from './repair'
import { TopicStructure } from './types'

const log = createLogger('topics')

export type TopicExtractionOptions = {
  backend: TextBackend
  model: string
  maxAttempts: number
  /** Fixed pause between attempts; throttles an overloaded backend rather than backing off. */
  retryDelayMs: number
  signal?: AbortSignal
}

/**
 * Asks the backend for the topic outline, retrying on empty, failed or unusable output.
 * Resolves with NoTopicsExtractedError once every attempt is spent; never rejects.
 */
export async function extractTopics(
  transcript: string,
  language: string,
  opts: TopicExtractionOptions
): Promise<Result<TopicStructure[], NoTopicsExtractedError>> {
  const prompt = topicExtractionPrompt(transcript, language)
  let lastError: PipelineError | undefined

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    if (attempt > 1 && opts.retryDelayMs > 0) await sleep(opts.retryDelayMs)

    const res = await requestText(opts.backend, opts.model, prompt, opts.signal)
    if (!res.ok) {
      lastError = res.error
      log.warn(`attempt ${attempt}/${opts.maxAttempts}: ${res.error.message}`)
      continue
    }

    const topics = mapTopicList(repairJson(res.value))
    if (topics.length > 0) {
      log.info(`extracted ${topics.length} topics on attempt ${attempt}`)
      return { ok: true, value: topics }
    }

    lastError = new MalformedOutputError('no topics could be read from the response')
    log.warn(`attempt ${attempt}/${opts.maxAttempts}: no topics parsed`)
    log.debug('unparsed topic response', preview(res.value))
  }

  return {
    ok: false,
    error: new NoTopicsExtractedError(`no topics after ${opts.maxAttempts} attempts`, { cause: lastError })
  }
}
