import { ensureCommandAvailable, runCLI } from './process'

export async function convertTo16kMonoWav(inputPath: string, outputPath: string) {
  await runCLI('ffmpeg', ['-y', '-i', inputPath, '-ar', '16000', '-ac', '1', '-c:a', 'pcm_s16le', outputPath])
}

export async function ensureFfmpegAvailable() {
  await ensureCommandAvailable('ffmpeg', ['-version'])
}
