import { defineEventHandler } from 'h3'
import type { StartThreadResponse } from '@assistant-bridge/shared'
import { getBridgeServices } from '../../../../src/services/bridge-container'
import { errorMessage } from '../../../../src/services/errors'
import { getLogger } from '../../../../src/services/logger'
import { getCorrelationId } from '../../../../src/utils/event-context'

export default defineEventHandler(async (event): Promise<StartThreadResponse> => {
  const log = getLogger()
  const correlationId = getCorrelationId(event)
  try {
    const { client } = getBridgeServices()
    const thread = await client.createThread()
    log.info('thread_created', { correlationId, threadId: thread.id })
    return { thread_id: thread.id }
  } catch (err) {
    const reason = errorMessage(err)
    log.error('thread_create_failed', { correlationId, error: reason })
    return { thread_id: null, error: reason }
  }
})
