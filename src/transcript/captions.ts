const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' '
}

function isCueMetadata(line: string): boolean {
  return (
    line.startsWith('WEBVTT') ||
    line.startsWith('NOTE') ||
    /^(Kind|Language):/.test(line) ||
    line.includes('-->') ||
    /^\d+$/.test(line.trim())
  )
}

/**
 * Caption or speech-to-text output as plain lines: headers, cue numbers and timings, inline
 * timestamps, tags and `[Music]`-style annotations are dropped, as are consecutive repeats
 * (auto-generated captions repeat each line as the next cue scrolls in).
 */
export const captionLines = (raw: string): string[] => {
  const cleaned: string[] = []

  for (const line of raw.split(/\r?\n/)) {
    if (!line || isCueMetadata(line)) continue
    const stripped = line
      .replace(/<\d{2}:\d{2}:\d{2}[.,]\d{3}>/g, '')
      .replace(/<[^>]+>/g, '')
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
      .replace(/\s+/g, ' ')
      .trim()
    if (!stripped || /^\[[^\]]*\]$/.test(stripped)) continue
    if (stripped === cleaned[cleaned.length - 1]) continue
    cleaned.push(stripped)
  }

  return cleaned
}

export const cleanTranscript = (raw: string): string => captionLines(raw).join('\n')
