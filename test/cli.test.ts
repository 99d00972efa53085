import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CliRuntime, main } from '../src/cli'
import { mergeConfig } from '../src/config'
import { NotesResponse } from '../src/notes/types'
import { WorkerPool } from '../src/notes/workerPool'

const notes: NotesResponse = {
  topics: [{ title: 'Video Notes', subtopics: [] }],
  language: 'German',
  status: 'fallback'
}

function fakeRuntime(): CliRuntime {
  return {
    config: mergeConfig({ shutdownGraceMs: 0 }),
    pool: new WorkerPool(1),
    pipeline: { generateNotes: vi.fn(async () => notes) },
    transcripts: {
      acquireTranscript: vi.fn(async () => 'caption words '.repeat(10)),
      transcribeVideoAudio: vi.fn(async () => '')
    }
  }
}

describe('cli', () => {
  let dir = ''

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'study-notes-cli-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('writes notes for a transcript file and shuts the pool down', async () => {
    const input = path.join(dir, 'talk.txt')
    const output = path.join(dir, 'notes.json')
    fs.writeFileSync(input, 'the transcript')
    const runtime = fakeRuntime()

    expect(await main(['notes', input, output, 'German'], runtime)).toBe(0)
    expect(JSON.parse(fs.readFileSync(output, 'utf8'))).toEqual(notes)
    expect(runtime.pipeline.generateNotes).toHaveBeenCalledWith('the transcript', 'German')
    expect(runtime.pool.isShutdown).toBe(true)
  })

  it('writes notes for a video with its URL', async () => {
    const output = path.join(dir, 'video.json')
    const url = 'https://video.example.test/watch?v=abc'

    expect(await main(['video', url, output], fakeRuntime())).toBe(0)
    expect(JSON.parse(fs.readFileSync(output, 'utf8'))).toEqual({ ...notes, videoUrl: url })
  })

  it('fails on a missing input file', async () => {
    const missing = path.join(dir, 'missing.txt')
    const runtime = fakeRuntime()

    expect(await main(['notes', missing, path.join(dir, 'out.json')], runtime)).toBe(1)
    expect(console.error).toHaveBeenCalledWith('Error:', `Input not found: ${missing}`)
    expect(runtime.pool.isShutdown).toBe(true)
  })

  it('prints usage for an unknown command', async () => {
    expect(await main(['diagram'], fakeRuntime())).toBe(1)
    expect(console.log).toHaveBeenCalledWith('Usage: study-notes <command> [args]')
  })

  it('prints usage errors for missing arguments', async () => {
    expect(await main(['video'], fakeRuntime())).toBe(1)
    expect(console.error).toHaveBeenCalledWith('Error:', 'Usage: video <url> <output.json> [language]')
  })
})
