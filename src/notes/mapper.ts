import { ImagePlaceholder, SubtopicContent, TableData, TopicContent, TopicStructure } from './types'

/*
 * Field-name aliases, tried in order. Models drift between schemas from one call to the
 * next, so every field the pipeline reads has more than one accepted spelling.
 */
const TOPIC_TITLE_KEYS = ['title', 'mainTopic', 'topic', 'name', 'heading']
const SUBTOPIC_LIST_KEYS = ['subtopics', 'subTopics', 'topics', 'sections', 'content', 'items']
const SUBTOPIC_TITLE_KEYS = ['title', 'name', 'heading', 'subtopic', 'subTopic', 'topic']
const DESCRIPTION_KEYS = ['description', 'summary', 'overview', 'intro']
const CONTENT_KEYS = ['content', 'body', 'text', 'details', 'explanation', 'notes']
const IMAGE_KEYS = ['images', 'imagePositions', 'imageSuggestions']
const TABLE_KEYS = ['tables', 'tablePositions', 'tableSuggestions']
const IMAGE_DESCRIPTION_KEYS = ['description', 'caption', 'prompt', 'alt']
const TABLE_TITLE_KEYS = ['title', 'name', 'caption']

const TOPIC_LIST_KEYS = ['topics', 'mainTopics', 'items', 'data']
const MAIN_TOPIC_KEYS = ['mainTopic', 'title', 'topic', 'name', 'heading']
const TOPIC_SUBTOPIC_KEYS = ['subtopics', 'subTopics', 'topics', 'sections', 'items']

type Json = string | number | boolean | null | Json[] | { [key: string]: Json }
type JsonObject = { [key: string]: Json }

function parse(candidate: string): Json | undefined {
  try {
    const value: Json = JSON.parse(candidate)
    return value
  } catch {
    return undefined
  }
}

function isObject(value: Json | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asText(value: Json | undefined): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim()
  if (typeof value === 'number') return String(value)
  return undefined
}

function pickText(obj: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const text = asText(obj[key])
    if (text !== undefined) return text
  }
  return undefined
}

function pickList(obj: JsonObject, keys: readonly string[]): Json[] | undefined {
  for (const key of keys) {
    const value = obj[key]
    if (Array.isArray(value) && value.length > 0) return value
  }
  // a lone object in place of the list is a one-element list
  for (const key of keys) {
    const value = obj[key]
    if (isObject(value) && Object.keys(value).length > 0) return [value]
  }
  return undefined
}

function pickBody(obj: JsonObject): string {
  for (const key of CONTENT_KEYS) {
    const value = obj[key]
    const text = asText(value)
    if (text !== undefined) return text
    if (Array.isArray(value)) {
      const parts = value.map(asText).filter((p): p is string => p !== undefined)
      if (parts.length) return parts.join('\n\n')
    }
  }
  return ''
}

function nonNegativeInt(value: Json | undefined, fallback: number): number {
  const n = typeof value === 'string' ? Number(value) : value
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 ? n : fallback
}

function cell(value: Json): string {
  if (value === null) return ''
  return typeof value === 'object' ? JSON.stringify(value) : String(value)
}

function toImage(entry: Json, i: number): ImagePlaceholder | null {
  if (typeof entry === 'string') {
    return entry.trim() ? { position: i + 1, description: entry.trim(), imageUrl: null, placeholder: true } : null
  }
  if (!isObject(entry)) return null
  const description = pickText(entry, IMAGE_DESCRIPTION_KEYS)
  if (description === undefined) return null
  return { position: nonNegativeInt(entry.position, i + 1), description, imageUrl: null, placeholder: true }
}

function toHeaders(value: Json | undefined): string[] {
  if (Array.isArray(value)) return value.map(cell)
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((h) => h.trim())
      .filter(Boolean)
  }
  return []
}

function toRow(value: Json): string[] {
  if (Array.isArray(value)) return value.map(cell)
  if (isObject(value)) return Object.values(value).map(cell)
  return [cell(value)]
}

/** Rows are passed through even when their length does not match the headers. */
function toTable(entry: Json, i: number): TableData | null {
  if (!isObject(entry)) return null
  const rows = Array.isArray(entry.rows) ? entry.rows.map(toRow) : []
  const headers = toHeaders(entry.headers ?? entry.columns)
  if (!headers.length && !rows.length) return null
  return {
    position: nonNegativeInt(entry.position, i + 1),
    title: pickText(entry, TABLE_TITLE_KEYS) ?? `Table ${i + 1}`,
    headers,
    rows
  }
}

function collect<T>(entries: Json[] | undefined, map: (entry: Json, i: number) => T | null): T[] {
  const out: T[] = []
  entries?.forEach((entry, i) => {
    const value = map(entry, i)
    if (value !== null) out.push(value)
  })
  return out
}

const IMAGE_MARKER = /\[IMAGE:\s*([^\]]+)\]/gi
const TABLE_MARKER = /\[TABLE:\s*([^\]]+)\]/gi

function splitCells(part: string | undefined): string[] {
  return (part ?? '')
    .split(',')
    .map((c) => c.trim())
    .filter(Boolean)
}

/**
 * Reads `[IMAGE: description]` and `[TABLE: title | h1, h2 | a, b | ...]` markers out of prose.
 * Positions count markers of each kind in order of appearance, starting at 1. The text itself
 * is left as written.
 */
export function extractInlineMarkers(content: string): Pick<SubtopicContent, 'images' | 'tables'> {
  const images: ImagePlaceholder[] = []
  for (const [, description] of content.matchAll(IMAGE_MARKER)) {
    images.push({ position: images.length + 1, description: description.trim(), imageUrl: null, placeholder: true })
  }

  const tables: TableData[] = []
  for (const [, body] of content.matchAll(TABLE_MARKER)) {
    const [title, headers, ...rows] = body.split('|').map((p) => p.trim())
    tables.push({
      position: tables.length + 1,
      title: title || `Table ${tables.length + 1}`,
      headers: splitCells(headers),
      rows: rows.map(splitCells).filter((r) => r.length > 0)
    })
  }
  return { images, tables }
}

function toSubtopic(entry: Json, i: number): SubtopicContent | null {
  if (typeof entry === 'string') {
    return entry.trim()
      ? { title: `Subtopic ${i + 1}`, description: '', content: entry.trim(), images: [], tables: [] }
      : null
  }
  if (!isObject(entry)) return null

  const title = pickText(entry, SUBTOPIC_TITLE_KEYS) ?? `Subtopic ${i + 1}`
  const description = pickText(entry, DESCRIPTION_KEYS) ?? ''
  const body = pickBody(entry)
  const images = collect(pickList(entry, IMAGE_KEYS), toImage)
  const tables = collect(pickList(entry, TABLE_KEYS), toTable)

  if (images.length || tables.length) return { title, description, content: body, images, tables }
  return { title, description, content: body, ...extractInlineMarkers(body) }
}

function subtopicEntries(root: Json): Json[] | undefined {
  if (Array.isArray(root)) return root
  if (!isObject(root)) return undefined
  // the canonical key first; aliases only when it is missing or empty
  const direct = root.subtopics
  if (Array.isArray(direct) && direct.length > 0) return direct
  return pickList(root, SUBTOPIC_LIST_KEYS)
}

/**
 * Maps a repaired candidate onto a TopicContent. Returns null when nothing usable is found,
 * which tells the caller to fall back to plain-text recovery.
 */
export function mapTopicContent(jsonCandidate: string, sourceTopic: TopicStructure): TopicContent | null {
  const root = parse(jsonCandidate)
  if (root === undefined) return null

  const subtopics = collect(subtopicEntries(root), toSubtopic)
  if (!subtopics.length) return null

  const title = (isObject(root) ? pickText(root, TOPIC_TITLE_KEYS) : undefined) ?? sourceTopic.mainTopic
  return { title, subtopics }
}

function subtopicTitles(value: Json | undefined): string[] {
  if (typeof value === 'string') return value.trim() ? [value.trim()] : []
  if (!Array.isArray(value)) return []
  const titles: string[] = []
  for (const entry of value) {
    const title = isObject(entry) ? pickText(entry, SUBTOPIC_TITLE_KEYS) : asText(entry)
    if (title !== undefined) titles.push(title)
  }
  return titles
}

function toTopicStructure(entry: Json): TopicStructure | null {
  const mainTopic = isObject(entry) ? pickText(entry, MAIN_TOPIC_KEYS) : asText(entry)
  if (mainTopic === undefined) return null
  if (!isObject(entry)) return { mainTopic, subtopics: [] }
  const list = TOPIC_SUBTOPIC_KEYS.map((k) => entry[k]).find((v) => subtopicTitles(v).length > 0)
  return { mainTopic, subtopics: subtopicTitles(list) }
}

/** Parses a list of topic structures; bad entries are dropped and a parse failure yields []. */
export function mapTopicList(jsonCandidate: string): TopicStructure[] {
  const root = parse(jsonCandidate)
  if (root === undefined) return []

  let entries: Json[] | undefined
  if (Array.isArray(root)) entries = root
  else if (isObject(root)) entries = pickList(root, TOPIC_LIST_KEYS) ?? (pickText(root, MAIN_TOPIC_KEYS) ? [root] : undefined)

  return collect(entries, toTopicStructure)
}
