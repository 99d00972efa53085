import { TextBackend } from '../llm'
import { createLogger } from '../logger'
import { requestText } from './backend'
import { spellCorrectionPrompt } from './prompts'

const log = createLogger('spell')

export type SpellCorrector = (text: string, language: string) => Promise<string>

/** Returns the original text whenever correction is not possible. */
export function createSpellCorrector(backend: TextBackend, model: string): SpellCorrector {
  return async (text, language) => {
    if (!text.trim()) return text
    log.info(`correcting transcript (${text.length} chars)`)
    const res = await requestText(backend, model, spellCorrectionPrompt(text, language))
    if (!res.ok) {
      log.warn(`spell correction skipped: ${res.error.message}`)
      return text
    }
    return res.value.trim()
  }
}
