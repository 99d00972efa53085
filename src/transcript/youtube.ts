import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { convertTo16kMonoWav, ensureFfmpegAvailable } from '../interfaces/ffmpeg'
import { ensureWhisperAvailable, transcribeWithWhisper } from '../interfaces/whisper'
import { downloadAudio, downloadSubtitles } from '../interfaces/ytDlp'
import { createLogger } from '../logger'
import { errorMessage } from '../notes/errors'
import { NotesResponse } from '../notes/types'
import { cleanTranscript } from './captions'

const log = createLogger('transcript')

/** Shorter transcripts are treated as missing. */
export const MIN_TRANSCRIPT_CHARS = 100

const SUBTITLE_SUFFIXES = ['.en.vtt', '.vtt', '.en.txt', '.txt']

export interface TranscriptSource {
  /** Captions for the video, or null when there are none worth using. */
  acquireTranscript(videoUrl: string): Promise<string | null>
  /** Speech-to-text over the video's audio track. */
  transcribeVideoAudio(videoUrl: string): Promise<string>
}

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'study-notes-'))
  try {
    return await fn(dir)
  } finally {
    await fs.rm(dir, { recursive: true, force: true })
  }
}

export async function findSubtitleFile(dir: string): Promise<string | null> {
  const files = await fs.readdir(dir)
  for (const suffix of SUBTITLE_SUFFIXES) {
    const match = files.find((f) => f.endsWith(suffix))
    if (match) return path.join(dir, match)
  }
  return null
}

export async function acquireTranscript(videoUrl: string): Promise<string | null> {
  return withTempDir(async (dir) => {
    try {
      await downloadSubtitles(videoUrl, path.join(dir, 'subs.%(ext)s'))
    } catch (e) {
      log.warn('subtitle download failed', errorMessage(e))
      return null
    }

    const file = await findSubtitleFile(dir)
    if (!file) {
      log.info('no subtitles available')
      return null
    }

    const transcript = cleanTranscript(await fs.readFile(file, 'utf8'))
    if (transcript.length < MIN_TRANSCRIPT_CHARS) {
      log.info(`subtitles too short (${transcript.length} chars)`)
      return null
    }
    log.info(`captions transcript: ${transcript.length} chars`)
    return transcript
  })
}

/** yt-dlp audio → 16 kHz mono WAV → whisper-cli. */
export async function transcribeVideoAudio(videoUrl: string, whisperModel: string): Promise<string> {
  await ensureFfmpegAvailable()
  await ensureWhisperAvailable()

  return withTempDir(async (dir) => {
    const mp3Path = path.join(dir, 'audio.mp3')
    const wavPath = path.join(dir, 'audio.wav')

    log.info('downloading audio')
    await downloadAudio(videoUrl, path.join(dir, 'audio.%(ext)s'))
    await convertTo16kMonoWav(mp3Path, wavPath)

    log.info('transcribing audio')
    const transcript = cleanTranscript(await transcribeWithWhisper(whisperModel, wavPath, path.join(dir, 'transcript')))
    log.info(`speech-to-text transcript: ${transcript.length} chars`)
    return transcript
  })
}

export function createYoutubeSource(whisperModel: string): TranscriptSource {
  return {
    acquireTranscript,
    transcribeVideoAudio: (videoUrl) => transcribeVideoAudio(videoUrl, whisperModel)
  }
}

export type NotesGenerator = {
  generateNotes(transcript: string, language: string): Promise<NotesResponse>
}

/**
 * Captions first, speech-to-text when there are none. Acquisition failures reject; the notes
 * pipeline itself never does.
 */
export async function generateNotesFromVideo(
  videoUrl: string,
  language: string,
  pipeline: NotesGenerator,
  source: TranscriptSource
): Promise<NotesResponse> {
  let transcript = await source.acquireTranscript(videoUrl)
  if (!transcript || transcript.trim().length < MIN_TRANSCRIPT_CHARS) {
    log.info('no usable captions; falling back to speech-to-text')
    transcript = await source.transcribeVideoAudio(videoUrl)
  }
  if (!transcript.trim()) {
    throw new Error(`could not obtain a transcript for ${videoUrl}`)
  }

  const response = await pipeline.generateNotes(transcript, language)
  return { ...response, videoUrl }
}
