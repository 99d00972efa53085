import { spawn } from 'node:child_process'
import { debug } from '../logger'

/**
 * Runs a command without a shell, feeding `input` on stdin, and resolves with stdout.
 * Rejects on a non-zero exit code, a spawn error, or when `signal` aborts (the child is killed).
 */
export async function runCLI(command: string, args: string[], input = '', signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], signal })
    let out = ''
    let err = ''

    child.stdout.on('data', (chunk) => (out += String(chunk)))
    child.stderr.on('data', (chunk) => (err += String(chunk)))

    child.on('error', (e) => reject(e))
    child.on('close', (code) => {
      if (code !== 0) {
        return reject(new Error(`${command} exited ${code}: ${err.trim()}`))
      }
      resolve(out)
    })

    // the child may exit before reading stdin; its exit code is reported by 'close'
    child.stdin.on('error', (e) => debug(`${command} stdin closed early`, e.message))
    if (input) {
      child.stdin.write(input)
    }
    child.stdin.end()
  })
}

export async function ensureCommandAvailable(command: string, versionArgs: string[] = ['--version']) {
  try {
    await runCLI(command, versionArgs)
  } catch (err) {
    throw new Error(`${command} not available on PATH`, { cause: err })
  }
}
