import { NotesConfig } from '../config'
import { TextBackend } from '../llm'
import { createLogger } from '../logger'
import { requestText } from './backend'
import { errorMessage, NoTopicsExtractedError, Result, TotalPipelineFailureError } from './errors'
import { generateAll } from './fanOut'
import { languageOrDefault, simpleNotesPrompt } from './prompts'
import { createSpellCorrector, SpellCorrector } from './spellCorrection'
import { extractTopics } from './topicExtraction'
import { NotesResponse, subtopic, TopicContent } from './types'
import { WorkerPool } from './workerPool'

const log = createLogger('cascade')

export type Tier = 'structured' | 'simple' | 'emergency'

export type TierOutcome = {
  tier: Tier
  outcome: 'completed' | 'failed'
  reason?: string
}

export type PipelineRun = {
  response: NotesResponse
  /** Every tier that was tried, in order. */
  trail: TierOutcome[]
}

export type NotesPipelineDeps = {
  backend: TextBackend
  pool: WorkerPool
  config: NotesConfig
  /** Defaults to a backend-driven corrector; only used when `config.spellCorrection` is on. */
  spellCorrector?: SpellCorrector
}

/**
 * Transcript in, notes out. Degrades from structured notes to a single plain-text summary and
 * finally to the raw transcript; the `status` field reports which tier answered. Never rejects.
 */
export class NotesPipeline {
  private readonly correct: SpellCorrector

  constructor(private readonly deps: NotesPipelineDeps) {
    this.correct = deps.spellCorrector ?? createSpellCorrector(deps.backend, deps.config.model)
  }

  async generateNotes(transcript: string, language: string): Promise<NotesResponse> {
    const { response } = await this.run(transcript, language)
    return response
  }

  async run(transcript: string, language: string): Promise<PipelineRun> {
    const lang = languageOrDefault(language)
    const trail: TierOutcome[] = []

    const text = await this.prepare(transcript, lang)

    const structured = await this.settle('structured', () => this.structuredNotes(text, lang))
    if (structured.ok) {
      trail.push({ tier: 'structured', outcome: 'completed' })
      return { response: { topics: structured.value, language: lang, status: 'success' }, trail }
    }
    trail.push({ tier: 'structured', outcome: 'failed', reason: structured.error.message })
    log.warn(`structured notes failed (${structured.error.message}); trying simple notes`)

    const simple = await this.settle('simple', () => this.simpleNotes(text, lang))
    if (simple.ok) {
      trail.push({ tier: 'simple', outcome: 'completed' })
      return { response: { topics: [simple.value], language: lang, status: 'fallback' }, trail }
    }
    trail.push({ tier: 'simple', outcome: 'failed', reason: simple.error.message })
    log.error(`simple notes failed (${simple.error.message}); returning the transcript`)

    trail.push({ tier: 'emergency', outcome: 'completed' })
    return { response: this.emergencyNotes(transcript, lang), trail }
  }

  /** Turns an unexpected throw inside a tier into that tier's failure. */
  private async settle<T>(tier: Tier, stage: () => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    try {
      return await stage()
    } catch (e) {
      log.error(`${tier} notes threw unexpectedly`, e)
      return { ok: false, error: e instanceof Error ? e : new Error(errorMessage(e)) }
    }
  }

  private async prepare(transcript: string, language: string): Promise<string> {
    if (!this.deps.config.spellCorrection) return transcript
    try {
      return await this.correct(transcript, language)
    } catch (e) {
      log.warn('spell correction failed; using the original transcript', errorMessage(e))
      return transcript
    }
  }

  private async structuredNotes(
    transcript: string,
    language: string
  ): Promise<Result<TopicContent[], NoTopicsExtractedError>> {
    const { backend, pool, config } = this.deps
    const topics = await extractTopics(transcript, language, {
      backend,
      model: config.model,
      ...config.topicExtraction
    })
    if (!topics.ok) return topics

    const content = await generateAll(topics.value, transcript, language, {
      backend,
      model: config.model,
      maxAttempts: config.content.maxAttempts,
      fillerLimit: config.fallback.plainTextFillerLimit,
      pool,
      taskTimeoutMs: config.fanOut.taskTimeoutMs
    })
    return { ok: true, value: content }
  }

  private async simpleNotes(transcript: string, language: string): Promise<Result<TopicContent, TotalPipelineFailureError>> {
    const { backend, config } = this.deps
    const res = await requestText(backend, config.model, simpleNotesPrompt(transcript, language))
    if (!res.ok) {
      return { ok: false, error: new TotalPipelineFailureError('simple notes generation failed', { cause: res.error }) }
    }
    return {
      ok: true,
      value: {
        title: 'Video Notes',
        subtopics: [subtopic('Summary', 'Generated notes from video transcript', res.value.trim())]
      }
    }
  }

  /** Performs no I/O. */
  private emergencyNotes(transcript: string, language: string): NotesResponse {
    const body = transcript.slice(0, this.deps.config.fallback.emergencyTranscriptLimit)
    return {
      topics: [{ title: 'Video Notes', subtopics: [subtopic('Transcript', 'Raw transcript from video', body)] }],
      language,
      status: 'emergency_fallback'
    }
  }
}
