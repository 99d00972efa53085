import fs from 'node:fs/promises'
import { ensureCommandAvailable, runCLI } from './process'

export async function ensureWhisperAvailable() {
  await ensureCommandAvailable('whisper-cli', ['--help'])
}

/**
 * Run whisper-cli on a 16 kHz mono WAV file and return the text it writes.
 * - modelPath: path to the ggml model
 * - outBase: path without extension, passed as `-of`; whisper-cli writes `<outBase>.txt`
 */
export async function transcribeWithWhisper(modelPath: string, wavPath: string, outBase: string): Promise<string> {
  await runCLI('whisper-cli', ['-m', modelPath, '-f', wavPath, '-otxt', '-of', outBase])

  const outTxtPath = `${outBase}.txt`
  try {
    return await fs.readFile(outTxtPath, 'utf8')
  } catch (err) {
    throw new Error(`Whisper did not produce transcript at ${outTxtPath}`, { cause: err })
  }
}
