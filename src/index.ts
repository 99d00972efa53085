import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'

dotenv.config({ path: appRootPath.path, silent: true })

import { Server } from 'node:http'
import { createLogger } from './logger'
import { createRuntime } from './runtime'
import { createApp } from './server'

const log = createLogger('server')

export function start(port = Number(process.env.PORT) || 8080): Server {
  const runtime = createRuntime()
  const server = createApp(runtime).listen(port, () => {
    log.info(`listening on http://localhost:${port} (model ${runtime.config.model} via ${runtime.config.provider})`)
  })

  let stopping = false
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) return
    stopping = true
    log.info(`${signal} received, shutting down`)
    server.close()
    const { forced } = await runtime.pool.shutdown(runtime.config.shutdownGraceMs)
    log.info(forced ? 'worker pool aborted after grace period' : 'worker pool drained')
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      stop(signal).catch((e) => {
        log.error('shutdown failed', e)
        process.exit(1)
      })
    })
  }

  return server
}

if (require.main === module) {
  start()
}
