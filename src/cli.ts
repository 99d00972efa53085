#!/usr/bin/env node
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'

dotenv.config({ path: appRootPath.path, silent: true })

import fs from 'node:fs'
import fsp from 'node:fs/promises'
import { NotesConfig } from './config'
import { errorMessage } from './notes/errors'
import { NotesResponse } from './notes/types'
import { WorkerPool } from './notes/workerPool'
import { createRuntime } from './runtime'
import { generateNotesFromVideo, NotesGenerator, TranscriptSource } from './transcript/youtube'

export type CliRuntime = {
  config: NotesConfig
  pool: WorkerPool
  pipeline: NotesGenerator
  transcripts: TranscriptSource
}

async function writeNotes(output: string, notes: NotesResponse) {
  await fsp.writeFile(output, JSON.stringify(notes, null, 2), 'utf8')
  console.log(`Notes written to ${output} (status: ${notes.status})`)
}

async function cmdNotes(runtime: CliRuntime, input?: string, output?: string, language = 'English') {
  if (!input || !output) throw new Error('Usage: notes <transcript.txt> <output.json> [language]')
  if (!fs.existsSync(input)) throw new Error(`Input not found: ${input}`)

  const transcript = await fsp.readFile(input, 'utf8')
  await writeNotes(output, await runtime.pipeline.generateNotes(transcript, language))
}

async function cmdVideo(runtime: CliRuntime, url?: string, output?: string, language = 'English') {
  if (!url || !output) throw new Error('Usage: video <url> <output.json> [language]')

  await writeNotes(output, await generateNotesFromVideo(url, language, runtime.pipeline, runtime.transcripts))
}

function usage() {
  console.log('Usage: study-notes <command> [args]')
  console.log('Commands:')
  console.log('  notes <transcript.txt> <output.json> [language]')
  console.log('  video <url> <output.json> [language]')
}

/** Returns the process exit code. The pool is always shut down before returning. */
export async function main(argv: string[], runtime: CliRuntime = createRuntime()): Promise<number> {
  const [cmd, ...args] = argv
  try {
    if (cmd === 'notes') await cmdNotes(runtime, args[0], args[1], args[2])
    else if (cmd === 'video') await cmdVideo(runtime, args[0], args[1], args[2])
    else {
      usage()
      return 1
    }
    return 0
  } catch (err) {
    console.error('Error:', errorMessage(err))
    return 1
  } finally {
    await runtime.pool.shutdown(runtime.config.shutdownGraceMs)
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then((code) => process.exit(code))
}
