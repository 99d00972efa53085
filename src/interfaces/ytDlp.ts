import { runCLI } from './process'

// `--` stops yt-dlp from reading a URL that starts with a dash as an option.

/** Writes English captions (uploaded or automatic) as VTT next to `outputTemplate`. */
export async function downloadSubtitles(videoUrl: string, outputTemplate: string) {
  await runCLI('yt-dlp', [
    '--write-auto-sub',
    '--write-sub',
    '--skip-download',
    '--sub-lang',
    'en',
    '--sub-format',
    'vtt',
    '-o',
    outputTemplate,
    '--',
    videoUrl
  ])
}

export async function downloadAudio(videoUrl: string, outputTemplate: string) {
  await runCLI('yt-dlp', ['-x', '--audio-format', 'mp3', '--audio-quality', '5', '-o', outputTemplate, '--', videoUrl])
}
