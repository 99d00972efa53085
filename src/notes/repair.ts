/**
 * Best-effort extraction of a JSON payload from raw model output.
 *
 * Every rule is a pure string transform that leaves the contents of JSON string
 * literals alone. Nothing here parses or throws: the caller's JSON.parse decides
 * whether the result is usable.
 */

type Segment = { text: string; literal: boolean }

/** Splits text into double-quoted string literals and the code between them. */
function segments(src: string): Segment[] {
  const out: Segment[] = []
  let code = ''
  let i = 0
  while (i < src.length) {
    if (src[i] !== '"') {
      code += src[i]
      i++
      continue
    }
    if (code) {
      out.push({ text: code, literal: false })
      code = ''
    }
    let j = i + 1
    let escaped = false
    while (j < src.length) {
      const c = src[j]
      if (escaped) escaped = false
      else if (c === '\\') escaped = true
      else if (c === '"') break
      j++
    }
    out.push({ text: src.slice(i, j + 1), literal: true })
    i = j + 1
  }
  if (code) out.push({ text: code, literal: false })
  return out
}

function mapSegments(src: string, onCode: (s: string) => string, onLiteral: (s: string) => string = (s) => s) {
  return segments(src)
    .map((s) => (s.literal ? onLiteral(s.text) : onCode(s.text)))
    .join('')
}

export function stripCodeFences(text: string): string {
  return text.replace(/```[\w-]*/g, '').trim()
}

type Span = { start: number; end: number }

function spanOf(text: string, open: string, close: string): Span | null {
  const start = text.indexOf(open)
  const end = text.lastIndexOf(close)
  return start !== -1 && end > start ? { start, end } : null
}

/**
 * Picks the outermost container. The object span wins unless the array span starts
 * strictly earlier, which is the case when a model wraps an array in prose.
 */
export function locateContainer(text: string): string | null {
  const obj = spanOf(text, '{', '}')
  const arr = spanOf(text, '[', ']')
  const chosen = obj && arr ? (arr.start < obj.start ? arr : obj) : obj ?? arr
  return chosen ? text.slice(chosen.start, chosen.end + 1) : null
}

export function removeTrailingCommas(src: string): string {
  return mapSegments(src, (code) => code.replace(/,(\s*[}\]])/g, '$1'))
}

/** `}{` and `][` only appear in concatenated output. */
export function insertMissingCommas(src: string): string {
  return mapSegments(src, (code) => code.replace(/}(\s*){/g, '},$1{').replace(/](\s*)\[/g, '],$1['))
}

export function stripComments(src: string): string {
  let out = ''
  let inString = false
  let escaped = false

  for (let i = 0; i < src.length; i++) {
    const ch = src[i]
    const next = src[i + 1]

    if (inString) {
      out += ch
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }

    if (ch === '"') {
      inString = true
      out += ch
      continue
    }

    if (ch === '/' && next === '/') {
      while (i < src.length && src[i] !== '\n') i++
      if (i < src.length) out += '\n'
      continue
    }

    if (ch === '/' && next === '*') {
      const close = src.indexOf('*/', i + 2)
      i = close === -1 ? src.length : close + 1
      continue
    }

    out += ch
  }
  return out
}

const CONTROL_ESCAPES: Record<string, string> = { '\n': '\\n', '\r': '\\r', '\t': '\\t' }

/** Models often put literal newlines inside string values. */
export function escapeControlCharacters(src: string): string {
  return mapSegments(
    src,
    (code) => code,
    // eslint-disable-next-line no-control-regex
    (literal) => literal.replace(/[\u0000-\u001f]/g, (c) => CONTROL_ESCAPES[c] ?? `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`)
  )
}

/** Appends the closers a truncated payload is missing, innermost first. */
export function closeOpenContainers(src: string): string {
  const stack: string[] = []
  let inString = false
  let escaped = false

  for (const ch of src) {
    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === '"') inString = true
    else if (ch === '{') stack.push('}')
    else if (ch === '[') stack.push(']')
    else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop()
  }

  if (!inString && stack.length === 0) return src
  return (inString ? `${src}"` : src) + stack.reverse().join('')
}

function fixCommas(src: string): string {
  return insertMissingCommas(removeTrailingCommas(src))
}

/**
 * Isolates the JSON candidate in a raw backend response and applies the repair rules.
 * Returns the trimmed, fence-free text when no container is found.
 */
export function repairJson(rawText: string): string {
  const cleaned = stripCodeFences(rawText)
  const container = locateContainer(cleaned)
  if (container === null) return cleaned

  let candidate = fixCommas(container)
  candidate = stripComments(candidate)
  // comment removal can expose new trailing commas
  candidate = fixCommas(candidate)
  candidate = escapeControlCharacters(candidate)
  candidate = closeOpenContainers(candidate)
  return candidate.trim()
}
