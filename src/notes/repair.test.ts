import { describe, expect, it } from 'vitest'
import {
  closeOpenContainers,
  escapeControlCharacters,
  insertMissingCommas,
  locateContainer,
  removeTrailingCommas,
  repairJson,
  stripCodeFences,
  stripComments
} from './repair'

describe('repairJson', () => {
  it('strips fences and trailing commas', () => {
    const raw = '```json\n{"a": [1, 2,],}\n```'
    expect(repairJson(raw)).toBe('{"a": [1, 2]}')
    expect(JSON.parse(repairJson(raw))).toEqual({ a: [1, 2] })
  })

  it('extracts exactly the array span when prose wraps an array', () => {
    const raw = 'Here are the topics: [{"mainTopic":"X","subtopics":["a"]}] hope this helps'
    expect(repairJson(raw)).toBe('[{"mainTopic":"X","subtopics":["a"]}]')
  })

  it('prefers the object span when it starts first', () => {
    expect(repairJson('Result: {"topics": [1]} done')).toBe('{"topics": [1]}')
  })

  it('joins concatenated objects', () => {
    const out = repairJson('[{"a":1}\n{"b":2}]')
    expect(out).toBe('[{"a":1},\n{"b":2}]')
    expect(JSON.parse(out)).toEqual([{ a: 1 }, { b: 2 }])
  })

  it('removes comments without touching URLs inside strings', () => {
    const raw = '{"url": "http://x.com/a", // note\n "n": 1 /* c */}'
    expect(JSON.parse(repairJson(raw))).toEqual({ url: 'http://x.com/a', n: 1 })
  })

  it('removes a trailing comma exposed by comment removal', () => {
    expect(JSON.parse(repairJson('{"a": 1, // last\n}'))).toEqual({ a: 1 })
  })

  it('escapes raw newlines inside string values', () => {
    const raw = '{"content": "line one\nline two"}'
    expect(JSON.parse(repairJson(raw))).toEqual({ content: 'line one\nline two' })
  })

  it('closes containers left open by a truncated payload', () => {
    const raw = '{"topics": [{"a": 1}, {"b": 2'
    expect(repairJson(raw)).toBe('{"topics": [{"a": 1}]}')
  })

  it('returns the trimmed text when there is no container', () => {
    expect(repairJson('  just some prose  ')).toBe('just some prose')
    expect(repairJson('```\nplain notes\n```')).toBe('plain notes')
  })

  it('never throws on hostile input', () => {
    const inputs = ['', '}{', '][', '"', '{"a": "unterminated', '/* open', '[[[[', '{{}']
    for (const input of inputs) {
      expect(() => repairJson(input)).not.toThrow()
    }
  })

  it('turns a corpus of known-bad outputs into parseable JSON', () => {
    const corpus = [
      '{"a": 1,}',
      '[1, 2, 3,]',
      '```json\n[{"mainTopic": "A", "subtopics": ["x",],},]\n```',
      'Sure! {"title": "T", // the title\n "subtopics": []}',
      '{"a": /* inline */ 2}',
      '[{"x": 1}{"y": 2}]',
      '[[1][2]]',
      '{"text": "tab\there"}'
    ]
    for (const raw of corpus) {
      expect(() => JSON.parse(repairJson(raw))).not.toThrow()
    }
  })
})

describe('repair rules', () => {
  it('stripCodeFences removes fence markers with language tags', () => {
    expect(stripCodeFences('```json-ld\n{}\n```')).toBe('{}')
  })

  it('locateContainer ignores an inverted span', () => {
    expect(locateContainer('} nothing {')).toBeNull()
    expect(locateContainer('} then [1]')).toBe('[1]')
  })

  it('insertMissingCommas only joins concatenated containers', () => {
    expect(insertMissingCommas('[{"a": 1} {"b": 2}] [3]')).toBe('[{"a": 1}, {"b": 2}], [3]')
    expect(insertMissingCommas('["a" "b"]')).toBe('["a" "b"]')
  })

  it('leaves commas and brackets inside strings alone', () => {
    expect(removeTrailingCommas('{"s": "a,}"}')).toBe('{"s": "a,}"}')
    expect(insertMissingCommas('{"s": "}{"}')).toBe('{"s": "}{"}')
    expect(stripComments('{"u": "https://a.b/*c*/"}')).toBe('{"u": "https://a.b/*c*/"}')
  })

  it('escapeControlCharacters only touches string literals', () => {
    expect(escapeControlCharacters('{\n"a": "x\ty"\n}')).toBe('{\n"a": "x\\ty"\n}')
  })

  it('closeOpenContainers closes an open string first', () => {
    expect(closeOpenContainers('["abc')).toBe('["abc"]')
    expect(closeOpenContainers('{"a": [1')).toBe('{"a": [1]}')
    expect(closeOpenContainers('{"a": 1}')).toBe('{"a": 1}')
  })
})
