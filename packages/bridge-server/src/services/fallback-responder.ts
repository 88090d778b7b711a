import type { AssistantRun, CompletionResult } from '@assistant-bridge/shared'
import type { AssistantRemoteClient } from './assistant-client'
import { errorMessage } from './errors'
import { getLogger, truncateForLog } from './logger'
import { firstNonEmptyText } from './reply-resolver'

export const FALLBACK_EMPTY_REPLY = 'Could not generate a fallback answer.'
export const FALLBACK_SYSTEM_INSTRUCTION = 'You are a helpful assistant. Answer briefly and clearly.'

// Why the stateful run did not produce a reply.
export type NonSuccessOutcome =
  | { kind: 'status'; run: AssistantRun }
  | { kind: 'timeout'; runId: string; attempts: number; elapsedMs: number }

export function describeOutcome(outcome: NonSuccessOutcome): string {
  if (outcome.kind === 'timeout') {
    return `Error: run timed out after ${outcome.attempts} attempts`
  }
  const { status, lastError } = outcome.run
  const detail = lastError ? ` (${lastError.code}: ${lastError.message})` : ''
  return `Error: run status ${status}${detail}`
}

export function extractCompletionText(result: CompletionResult): string | null {
  if (result.outputText) return result.outputText
  for (const item of result.output) {
    if (item.type !== 'message') continue
    const text = firstNonEmptyText(item.content)
    if (text) return text
  }
  return null
}

export class FallbackResponder {
  constructor(
    private readonly client: AssistantRemoteClient,
    private readonly model: string
  ) {}

  async respond(userText: string, outcome: NonSuccessOutcome, correlationId?: string): Promise<string> {
    const log = getLogger()
    log.warn('fallback_used', { correlationId, model: this.model, reason: describeOutcome(outcome) })
    try {
      const result = await this.client.complete(this.model, [
        { role: 'system', content: FALLBACK_SYSTEM_INSTRUCTION },
        { role: 'user', content: userText }
      ])
      const text = extractCompletionText(result) ?? FALLBACK_EMPTY_REPLY
      log.info('fallback_reply', { correlationId, reply: truncateForLog(text) })
      return text
    } catch (err) {
      const message = errorMessage(err)
      log.error('fallback_failed', { correlationId, error: message })
      return `${describeOutcome(outcome)}; fallback failed: ${message}`
    }
  }
}
