import { serve } from '@hono/node-server'
import { loadServiceConfig } from './config'
import { createApp } from './index'
import { createLogger } from './logger'

const config = loadServiceConfig()
const log = createLogger(config.logLevel)
const app = createApp({ config, logger: log })

serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info('timeline-blend listening', {
    port: info.port,
    coldStartEnabled: config.coldStartEnabled,
    maxCandidates: config.maxCandidates
  })
})
