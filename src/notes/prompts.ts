import { TopicStructure } from './types'

export function languageOrDefault(language: string | undefined): string {
  return language?.trim() || 'English'
}

export function topicExtractionPrompt(transcript: string, language: string): string {
  return `You are turning a video transcript into structured study notes.
First step: list the topics the video covers.

Main topics are broad areas (for example "Spring Framework" or "Database Design").
Subtopics are the specific concepts discussed under a main topic (for example "Dependency Injection" or "Bean Lifecycle").

Rules:
- Respond with a JSON array and nothing else. No markdown, no commentary.
- Each element has the shape {"mainTopic": "...", "subtopics": ["...", "..."]}.
- Cover every topic the speaker discusses, in the order they come up.
- Keep names short and specific.
- A video with one topic still gets an array with one element.

Example:
[
  {"mainTopic": "Spring Framework Basics", "subtopics": ["Dependency Injection", "Inversion of Control", "Bean Lifecycle"]},
  {"mainTopic": "Spring Boot Features", "subtopics": ["Auto Configuration", "Starter Dependencies", "Embedded Servers"]}
]

Language: ${languageOrDefault(language)}

Transcript:
${transcript}

JSON array:`
}

export function contentPrompt(topic: TopicStructure, transcript: string, language: string): string {
  const subtopics = topic.subtopics.length ? topic.subtopics.map((s) => `"${s}"`).join(', ') : '(none listed)'
  return `You are writing detailed study notes for one topic of a video.
The topics were already identified. Write notes for this topic only.

Topic: "${topic.mainTopic}"
Subtopics: ${subtopics}

Rules:
- Respond with a single JSON object and nothing else. No markdown, no commentary.
- Use this shape:
{
  "title": "Topic name",
  "subtopics": [
    {
      "title": "Subtopic name",
      "description": "One or two sentence overview",
      "content": "Full explanation with examples from the transcript",
      "images": [{"position": 1, "description": "What the illustration should show"}],
      "tables": [{"position": 1, "title": "Table title", "headers": ["A", "B"], "rows": [["a1", "b1"]]}]
    }
  ]
}
- Inside "content", mark where an illustration would help with [IMAGE: what it shows] and where a table
  would help with [TABLE: title | header1,header2 | row1col1,row1col2 | row2col1,row2col2].
- Suggest images for processes, flows and architectures. Suggest tables for comparisons and option lists.
- There is no length limit. Be thorough.
- Write in ${languageOrDefault(language)}.

Transcript:
${transcript}

JSON object:`
}

export function simpleNotesPrompt(transcript: string, language: string): string {
  return `Write study notes for the video transcript below as plain markdown text, not JSON.

Use ## headings for the main topics and bullet points for the key facts.
Include code examples where the speaker gives them and call out the important concepts.
Write in ${languageOrDefault(language)}.

Transcript:
${transcript}

Notes:`
}

export function spellCorrectionPrompt(transcript: string, language: string): string {
  return `Fix the spelling mistakes in the transcript below.

- Correct misspelled words, doubled or missing letters and obvious recognition errors.
- Keep technical terms, code, commands, package and class names, acronyms and URLs exactly as written unless they are clearly misspelled.
- Keep the meaning and punctuation.
- Output only the corrected transcript as plain text.

Language: ${languageOrDefault(language)}

Transcript:
${transcript}`
}
