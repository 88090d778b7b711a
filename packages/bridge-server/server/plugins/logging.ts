import { getHeader, setHeader } from 'h3'
import { defineNitroPlugin } from 'nitropack/runtime'
import { getLogger } from '../../src/services/logger'
import { getCorrelationId } from '../../src/utils/event-context'

export default defineNitroPlugin((nitro) => {
  const log = getLogger()

  nitro.hooks.hook('request', (event) => {
    const method = event.method
    const path = event.path
    const incoming = getHeader(event, 'x-correlation-id') || getHeader(event, 'x-request-id')
    if (incoming) event.context.correlationId = incoming
    const cid = getCorrelationId(event)
    setHeader(event, 'x-correlation-id', cid)

    const start = Date.now()
    log.info('request_received', { cid, method, path })

    event.node.res.on('finish', () => {
      log.info('request_completed', { cid, method, path, statusCode: event.node.res.statusCode, durationMs: Date.now() - start })
    })
  })
})
