import fs from 'node:fs'
import path from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { NotesResponse } from '../notes/types'

const { runCLI, ensureCommandAvailable } = vi.hoisted(() => ({
  runCLI: vi.fn<(command: string, args: string[]) => Promise<string>>(),
  ensureCommandAvailable: vi.fn(async (_command: string, _args?: string[]) => undefined)
}))

vi.mock('../interfaces/process', () => ({ runCLI, ensureCommandAvailable }))

import { acquireTranscript, generateNotesFromVideo, transcribeVideoAudio, TranscriptSource } from './youtube'

const VIDEO = 'https://video.example.test/watch?v=abc'

const captions = `WEBVTT
Kind: captions
Language: en

00:00:00.000 --> 00:00:03.000
Spring Boot makes it easy to create stand-alone applications.

00:00:03.000 --> 00:00:06.000
Dependency injection wires the beans together for you.
`

const outputTemplate = (args: string[]) => args[args.indexOf('-o') + 1]

function writeSubtitles(content: string, dirs: string[] = []) {
  runCLI.mockImplementation(async (_command, args) => {
    const template = outputTemplate(args)
    dirs.push(path.dirname(template))
    fs.writeFileSync(template.replace('%(ext)s', 'en.vtt'), content)
    return ''
  })
}

describe('acquireTranscript', () => {
  beforeEach(() => {
    runCLI.mockReset()
  })

  it('returns cleaned captions and removes the temp dir', async () => {
    const dirs: string[] = []
    writeSubtitles(captions, dirs)

    expect(await acquireTranscript(VIDEO)).toBe(
      'Spring Boot makes it easy to create stand-alone applications.\nDependency injection wires the beans together for you.'
    )
    const [command, args] = runCLI.mock.calls[0]
    expect(command).toBe('yt-dlp')
    expect(args).toContain('--skip-download')
    expect(args.slice(-2)).toEqual(['--', VIDEO])
    expect(fs.existsSync(dirs[0])).toBe(false)
  })

  it('treats short captions as missing', async () => {
    writeSubtitles('WEBVTT\n\n00:00:00.000 --> 00:00:01.000\ntoo short\n')
    expect(await acquireTranscript(VIDEO)).toBeNull()
  })

  it('returns null when no subtitle file was written', async () => {
    runCLI.mockResolvedValue('')
    expect(await acquireTranscript(VIDEO)).toBeNull()
  })

  it('returns null when yt-dlp fails', async () => {
    runCLI.mockRejectedValue(new Error('yt-dlp exited 1: unavailable'))
    expect(await acquireTranscript(VIDEO)).toBeNull()
  })
})

describe('transcribeVideoAudio', () => {
  beforeEach(() => {
    runCLI.mockReset()
    ensureCommandAvailable.mockClear()
  })

  it('downloads, converts and transcribes the audio', async () => {
    runCLI.mockImplementation(async (command, args) => {
      if (command === 'yt-dlp') fs.writeFileSync(outputTemplate(args).replace('%(ext)s', 'mp3'), 'mp3')
      if (command === 'ffmpeg') fs.writeFileSync(args[args.length - 1], 'wav')
      if (command === 'whisper-cli') {
        fs.writeFileSync(`${args[args.indexOf('-of') + 1]}.txt`, ' Hello from the talk.\n[BLANK_AUDIO]\n')
      }
      return ''
    })

    expect(await transcribeVideoAudio(VIDEO, 'model.bin')).toBe('Hello from the talk.')
    expect(runCLI.mock.calls.map(([command]) => command)).toEqual(['yt-dlp', 'ffmpeg', 'whisper-cli'])
    expect(runCLI.mock.calls[2][1].slice(0, 2)).toEqual(['-m', 'model.bin'])
    expect(ensureCommandAvailable).toHaveBeenCalledWith('ffmpeg', ['-version'])
    expect(ensureCommandAvailable).toHaveBeenCalledWith('whisper-cli', ['--help'])
  })

  it('fails when whisper writes no transcript', async () => {
    runCLI.mockResolvedValue('')
    await expect(transcribeVideoAudio(VIDEO, 'model.bin')).rejects.toThrow('Whisper did not produce transcript')
  })
})

describe('generateNotesFromVideo', () => {
  const longText = 'word '.repeat(40)
  const response: NotesResponse = { topics: [], language: 'English', status: 'success' }

  function fakes(captionsText: string | null, spoken = longText) {
    const source: TranscriptSource = {
      acquireTranscript: vi.fn(async () => captionsText),
      transcribeVideoAudio: vi.fn(async () => spoken)
    }
    const pipeline = { generateNotes: vi.fn(async () => response) }
    return { source, pipeline }
  }

  it('uses captions when they are long enough', async () => {
    const { source, pipeline } = fakes(longText)
    expect(await generateNotesFromVideo(VIDEO, 'English', pipeline, source)).toEqual({ ...response, videoUrl: VIDEO })
    expect(source.transcribeVideoAudio).not.toHaveBeenCalled()
    expect(pipeline.generateNotes).toHaveBeenCalledWith(longText, 'English')
  })

  it('falls back to speech-to-text for missing or short captions', async () => {
    for (const captionsText of [null, 'short']) {
      const { source, pipeline } = fakes(captionsText, 'spoken words')
      await generateNotesFromVideo(VIDEO, 'English', pipeline, source)
      expect(source.transcribeVideoAudio).toHaveBeenCalledWith(VIDEO)
      expect(pipeline.generateNotes).toHaveBeenCalledWith('spoken words', 'English')
    }
  })

  it('rejects when no transcript can be obtained', async () => {
    const { source, pipeline } = fakes(null, '  ')
    await expect(generateNotesFromVideo(VIDEO, 'English', pipeline, source)).rejects.toThrow(
      `could not obtain a transcript for ${VIDEO}`
    )
    expect(pipeline.generateNotes).not.toHaveBeenCalled()
  })
})
