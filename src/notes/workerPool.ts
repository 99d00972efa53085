import { createLogger } from '../logger'
import { PoolClosedError, TaskTimeoutError } from './errors'

const log = createLogger('pool')

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>

export type SubmitOptions = {
  /** Measured from when the task starts running, not from submission. */
  timeoutMs?: number
}

/**
 * Races `task` against a timer. `onTimeout` runs before the rejection so callers can cancel
 * the work that lost the race.
 */
export async function withTimeout<T>(task: Promise<T>, ms: number, onTimeout?: () => void): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  try {
    return await Promise.race([
      task,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          onTimeout?.()
          reject(new TaskTimeoutError(ms))
        }, ms)
        timer.unref?.()
      })
    ])
  } finally {
    clearTimeout(timer)
  }
}

type Job = {
  run: () => Promise<void>
  reject: (reason: Error) => void
}

/**
 * Fixed-size pool for backend-bound work. Each running task gets its own AbortSignal, which
 * fires on timeout or forced shutdown.
 */
export class WorkerPool {
  private readonly queue: Job[] = []
  private readonly running = new Set<AbortController>()
  private idleWaiters: Array<() => void> = []
  private activeCount = 0
  private closed = false

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`pool size must be a positive integer, got ${size}`)
    }
  }

  get active(): number {
    return this.activeCount
  }

  get pending(): number {
    return this.queue.length
  }

  get isShutdown(): boolean {
    return this.closed
  }

  submit<T>(task: PoolTask<T>, opts: SubmitOptions = {}): Promise<T> {
    if (this.closed) return Promise.reject(new PoolClosedError())

    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        const controller = new AbortController()
        this.running.add(controller)
        try {
          const work = task(controller.signal)
          const { timeoutMs } = opts
          resolve(
            timeoutMs
              ? await withTimeout(work, timeoutMs, () => controller.abort(new TaskTimeoutError(timeoutMs)))
              : await work
          )
        } catch (e) {
          reject(e)
        } finally {
          this.running.delete(controller)
        }
      }
      this.queue.push({ run, reject })
      this.drain()
    })
  }

  private drain() {
    while (this.activeCount < this.size && this.queue.length > 0) {
      const job = this.queue.shift()
      if (!job) break
      this.activeCount++
      void job.run().finally(() => {
        this.activeCount--
        if (this.activeCount === 0 && this.queue.length === 0) this.notifyIdle()
        this.drain()
      })
    }
  }

  private notifyIdle() {
    const waiters = this.idleWaiters
    this.idleWaiters = []
    waiters.forEach((w) => w())
  }

  /**
   * Stops accepting work and rejects everything still queued. Running tasks get `graceMs`
   * to finish; whatever is left after that is aborted.
   */
  async shutdown(graceMs = 60_000): Promise<{ forced: boolean }> {
    this.closed = true
    const dropped = this.queue.splice(0)
    dropped.forEach((job) => job.reject(new PoolClosedError()))
    if (dropped.length) log.info(`dropped ${dropped.length} queued tasks`)

    if (this.activeCount === 0) return { forced: false }

    let timer: ReturnType<typeof setTimeout> | undefined
    const idle = new Promise<boolean>((resolve) => this.idleWaiters.push(() => resolve(true)))
    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs)
    })
    const drained = await Promise.race([idle, grace])
    clearTimeout(timer)
    if (drained) return { forced: false }

    log.warn(`${this.running.size} tasks still running after ${graceMs}ms; aborting`)
    this.running.forEach((controller) => controller.abort(new PoolClosedError()))
    return { forced: true }
  }
}
