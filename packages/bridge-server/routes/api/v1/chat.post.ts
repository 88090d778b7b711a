import { createError, defineEventHandler, readBody } from 'h3'
import { ChatRequestSchema, type ChatResponse } from '@assistant-bridge/shared'
import { getBridgeServices } from '../../../src/services/bridge-container'
import { errorMessage, InvalidTurnRequestError } from '../../../src/services/errors'
import { getLogger } from '../../../src/services/logger'
import { getCorrelationId } from '../../../src/utils/event-context'

// Always answers 200 { response } so the front-end only has to read the payload;
// an empty thread_id is the one client error surfaced through the status code.
export default defineEventHandler(async (event): Promise<ChatResponse> => {
  const body: unknown = await readBody(event)
  const parsed = ChatRequestSchema.safeParse(body ?? {})
  if (!parsed.success) {
    throw createError({ statusCode: 400, statusMessage: 'Invalid chat request' })
  }
  const { thread_id: threadId, message } = parsed.data
  if (!threadId) {
    throw createError({ statusCode: 400, statusMessage: 'Missing thread_id' })
  }

  const correlationId = getCorrelationId(event)
  try {
    const { orchestrator } = getBridgeServices()
    const response = await orchestrator.submitTurn(threadId, message, correlationId)
    return { response }
  } catch (err) {
    if (err instanceof InvalidTurnRequestError) {
      throw createError({ statusCode: 400, statusMessage: err.message })
    }
    const reason = errorMessage(err)
    getLogger().error('chat_failed', { correlationId, threadId, error: reason })
    return { response: `Internal error: ${reason}` }
  }
})
