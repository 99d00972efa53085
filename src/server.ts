import cors from 'cors'
import express, { ErrorRequestHandler, Request, Response } from 'express'
import { z } from 'zod'
import { createLogger } from './logger'
import { errorMessage } from './notes/errors'
import { languageOrDefault } from './notes/prompts'
import { NotesResponse } from './notes/types'
import { generateNotesFromVideo, NotesGenerator, TranscriptSource } from './transcript/youtube'

const log = createLogger('server')

const GenerateRequest = z.object({
  videoUrl: z.string().trim().url(),
  language: z.string().optional()
})

const NotesRequest = z.object({
  transcript: z.string().refine((s) => s.trim().length > 0, 'must not be blank'),
  language: z.string().optional()
})

export type AppDeps = {
  pipeline: NotesGenerator
  transcripts: TranscriptSource
}

function validationMessage(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ')
}

const jsonBodyErrors: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'request body is not valid JSON' })
    return
  }
  next(err)
}

export function createApp(deps: AppDeps) {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '10mb' }))
  app.use(jsonBodyErrors)

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' })
  })

  app.post('/api/v1/generate', async (req: Request, res: Response) => {
    const parsed = GenerateRequest.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) })
      return
    }

    const { videoUrl } = parsed.data
    const language = languageOrDefault(parsed.data.language)
    log.info('[generate]', videoUrl, language)
    try {
      const notes = await generateNotesFromVideo(videoUrl, language, deps.pipeline, deps.transcripts)
      res.status(201).json(notes)
    } catch (e) {
      log.error('[generate] failed', videoUrl, e)
      const body: NotesResponse = { topics: [], language, status: 'error', error: errorMessage(e), videoUrl }
      res.status(500).json(body)
    }
  })

  app.post('/api/v1/notes', async (req: Request, res: Response) => {
    const parsed = NotesRequest.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) })
      return
    }

    const language = languageOrDefault(parsed.data.language)
    log.info('[notes]', `${parsed.data.transcript.length} chars`, language)
    try {
      res.status(201).json(await deps.pipeline.generateNotes(parsed.data.transcript, language))
    } catch (e) {
      log.error('[notes] failed', e)
      const body: NotesResponse = { topics: [], language, status: 'error', error: errorMessage(e) }
      res.status(500).json(body)
    }
  })

  return app
}
