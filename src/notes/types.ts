/** One main topic and its subtopic titles, as produced by topic extraction. */
export type TopicStructure = {
  readonly mainTopic: string
  readonly subtopics: readonly string[]
}

/** A request for an illustration, not rendered media. */
export type ImagePlaceholder = {
  position: number
  description: string
  imageUrl: null
  placeholder: true
}

/**
 * Row lengths are expected to match `headers` but are passed through unchecked:
 * backend output is not trusted to be well-formed.
 */
export type TableData = {
  position: number
  title: string
  headers: string[]
  rows: string[][]
}

export type SubtopicContent = {
  title: string
  description: string
  content: string
  images: ImagePlaceholder[]
  tables: TableData[]
}

export type TopicContent = {
  title: string
  subtopics: SubtopicContent[]
}

export type NotesStatus = 'success' | 'fallback' | 'emergency_fallback' | 'error'

export type NotesResponse = {
  topics: TopicContent[]
  language: string
  status: NotesStatus
  error?: string
  videoUrl?: string
}

export function subtopic(
  title: string,
  description: string,
  content: string,
  extras: Partial<Pick<SubtopicContent, 'images' | 'tables'>> = {}
): SubtopicContent {
  return { title, description, content, images: extras.images ?? [], tables: extras.tables ?? [] }
}
