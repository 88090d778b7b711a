import type { H3Event } from 'h3'
import { genCorrelationId } from '../services/logger'

declare module 'h3' {
  interface H3EventContext {
    correlationId?: string
  }
}

export function getCorrelationId(event: H3Event): string {
  if (!event.context.correlationId) {
    event.context.correlationId = genCorrelationId()
  }
  return event.context.correlationId
}
