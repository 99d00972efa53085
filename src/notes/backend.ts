import { TextBackend } from '../llm'
import { BackendUnavailableError, errorMessage, Result } from './errors'

/**
 * One backend call, with blank output classified as a failure. Never rejects.
 */
export async function requestText(
  backend: TextBackend,
  model: string,
  prompt: string,
  signal?: AbortSignal
): Promise<Result<string, BackendUnavailableError>> {
  try {
    const res = await backend.generate(model, prompt, signal)
    if (!res.success) {
      return { ok: false, error: new BackendUnavailableError(res.error || 'backend call failed') }
    }
    const text = res.data ?? ''
    if (!text.trim()) {
      return { ok: false, error: new BackendUnavailableError('backend returned an empty response') }
    }
    return { ok: true, value: text }
  } catch (e) {
    return { ok: false, error: new BackendUnavailableError(errorMessage(e), { cause: e }) }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms))
}
