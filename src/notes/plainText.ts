import { stripCodeFences } from './repair'
import { subtopic, TopicContent, TopicStructure } from './types'

export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text
}

/**
 * Wraps a raw, unparseable response as note content. Never fails.
 *
 * When the topic names its subtopics the same text is repeated under each of them, so it
 * is cut to `fillerLimit` characters. A single "Summary" subtopic carries the full text.
 */
export function fromPlainText(rawResponse: string, sourceTopic: TopicStructure, fillerLimit = 500): TopicContent {
  const text = stripCodeFences(rawResponse)

  if (sourceTopic.subtopics.length === 0) {
    return {
      title: sourceTopic.mainTopic,
      subtopics: [subtopic('Summary', 'Generated content from video transcript', text)]
    }
  }

  const filler = truncate(text, fillerLimit)
  return {
    title: sourceTopic.mainTopic,
    subtopics: sourceTopic.subtopics.map((title) => subtopic(title, 'Content extracted from video transcript', filler))
  }
}
