import { TextBackend } from '../llm'
import { createLogger, preview } from '../logger'
import { requestText } from './backend'
import { ContentGenerationExhaustedError, PipelineError, Result } from './errors'
import { mapTopicContent } from './mapper'
import { fromPlainText } from './plainText'
import { contentPrompt } from './prompts'
import { repairJson } from './repair'
import { subtopic, TopicContent, TopicStructure } from './types'

const log = createLogger('content')

export type ContentOptions = {
  backend: TextBackend
  model: string
  maxAttempts: number
  fillerLimit: number
  signal?: AbortSignal
}

/** Stand-in used when a topic produced no usable output at all. */
export function placeholderContent(topic: TopicStructure): TopicContent {
  if (topic.subtopics.length === 0) {
    return {
      title: topic.mainTopic,
      subtopics: [subtopic('Summary', 'Content not available', 'Unable to generate content at this time.')]
    }
  }
  return {
    title: topic.mainTopic,
    subtopics: topic.subtopics.map((title) =>
      subtopic(title, 'Content generation in progress', 'Detailed content will be added here.')
    )
  }
}

async function attemptContent(
  topic: TopicStructure,
  transcript: string,
  language: string,
  opts: ContentOptions
): Promise<Result<TopicContent, ContentGenerationExhaustedError>> {
  const prompt = contentPrompt(topic, transcript, language)
  let lastResponse: string | undefined
  let lastError: PipelineError | undefined

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    opts.signal?.throwIfAborted()

    const res = await requestText(opts.backend, opts.model, prompt, opts.signal)
    if (!res.ok) {
      lastError = res.error
      log.warn(`"${topic.mainTopic}" attempt ${attempt}/${opts.maxAttempts}: ${res.error.message}`)
      continue
    }

    lastResponse = res.value
    const content = mapTopicContent(repairJson(res.value), topic)
    if (content) return { ok: true, value: content }

    log.warn(`"${topic.mainTopic}" attempt ${attempt}/${opts.maxAttempts}: response did not map onto notes`)
    log.debug('unmapped content response', preview(res.value))
  }

  return {
    ok: false,
    error: new ContentGenerationExhaustedError(
      `no usable content for "${topic.mainTopic}" after ${opts.maxAttempts} attempts`,
      lastResponse,
      { cause: lastError }
    )
  }
}

/**
 * Generates notes for one topic. Always resolves with usable content: output that never maps
 * is salvaged as plain text, and a topic with no output at all gets the placeholder.
 * Rejects only when `signal` aborts.
 */
export async function generateContent(
  topic: TopicStructure,
  transcript: string,
  language: string,
  opts: ContentOptions
): Promise<TopicContent> {
  const res = await attemptContent(topic, transcript, language, opts)
  if (res.ok) {
    log.info(`generated "${res.value.title}" with ${res.value.subtopics.length} subtopics`)
    return res.value
  }

  const { lastResponse } = res.error
  if (lastResponse !== undefined) {
    log.warn(`${res.error.message}; using the raw response as plain text`)
    return fromPlainText(lastResponse, topic, opts.fillerLimit)
  }

  log.warn(`${res.error.message}; using placeholder content`)
  return placeholderContent(topic)
}
