import { createLogger } from '../logger'
import { ContentOptions, generateContent, placeholderContent } from './contentStage'
import { errorMessage, TaskTimeoutError } from './errors'
import { TopicContent, TopicStructure } from './types'
import { WorkerPool } from './workerPool'

const log = createLogger('fan-out')

export type FanOutOptions = Omit<ContentOptions, 'signal'> & {
  pool: WorkerPool
  taskTimeoutMs: number
}

/**
 * Generates content for every topic on the pool. The result has one entry per topic in input
 * order; a topic that fails or times out gets placeholder content instead of failing the batch.
 */
export async function generateAll(
  topics: readonly TopicStructure[],
  transcript: string,
  language: string,
  opts: FanOutOptions
): Promise<TopicContent[]> {
  const { pool, taskTimeoutMs, ...content } = opts
  log.info(`generating content for ${topics.length} topics (pool size ${pool.size})`)

  return Promise.all(
    topics.map(async (topic, index) => {
      try {
        return await pool.submit((signal) => generateContent(topic, transcript, language, { ...content, signal }), {
          timeoutMs: taskTimeoutMs
        })
      } catch (e) {
        const reason = e instanceof TaskTimeoutError ? `timed out after ${e.timeoutMs}ms` : errorMessage(e)
        log.warn(`topic ${index + 1} "${topic.mainTopic}" ${reason}; using placeholder content`)
        return placeholderContent(topic)
      }
    })
  )
}
