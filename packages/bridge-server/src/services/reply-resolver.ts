import type { AssistantRun, MessagePart, ThreadMessage } from '@assistant-bridge/shared'
import type { AssistantRemoteClient } from './assistant-client'
import { errorMessage } from './errors'
import { getLogger, truncateForLog } from './logger'

export const NO_ANSWER_REPLY = 'No reply was found from the assistant.'

export type ReplyResolverOptions = {
  stepListLimit: number
  messageScanLimit: number
}

export type ReplySource = 'run_steps' | 'thread_scan' | 'none'

export function firstNonEmptyText(parts: readonly MessagePart[]): string | null {
  for (const part of parts) {
    if (typeof part.text === 'string' && part.text.length > 0) return part.text
  }
  return null
}

export function extractAssistantText(message: ThreadMessage): string | null {
  if (message.role !== 'assistant') return null
  return firstNonEmptyText(message.parts)
}

/**
 * Locates the reply a completed run produced. The run's step log is authoritative;
 * the thread scan is best-effort and can surface a reply from an earlier run when
 * steps are unavailable.
 */
export class ReplyResolver {
  constructor(
    private readonly client: AssistantRemoteClient,
    private readonly opts: ReplyResolverOptions
  ) {}

  async resolve(threadId: string, run: AssistantRun, correlationId?: string): Promise<string> {
    const { text, source } = await this.resolveWithSource(threadId, run, correlationId)
    getLogger().info('reply_resolved', { correlationId, threadId, runId: run.id, source, reply: truncateForLog(text) })
    return text
  }

  async resolveWithSource(
    threadId: string,
    run: AssistantRun,
    correlationId?: string
  ): Promise<{ text: string; source: ReplySource }> {
    const fromSteps = await this.fromRunSteps(threadId, run, correlationId)
    if (fromSteps) return { text: fromSteps, source: 'run_steps' }

    const fromThread = await this.fromThreadScan(threadId)
    if (fromThread) return { text: fromThread, source: 'thread_scan' }

    return { text: NO_ANSWER_REPLY, source: 'none' }
  }

  private async fromRunSteps(threadId: string, run: AssistantRun, correlationId?: string): Promise<string | null> {
    const log = getLogger()
    let messageIds: string[]
    try {
      const steps = await this.client.listRunSteps(threadId, run.id, { order: 'asc', limit: this.opts.stepListLimit })
      messageIds = steps.flatMap((s) => (s.kind === 'message_creation' ? [s.messageId] : []))
    } catch (err) {
      log.warn('run_steps_unavailable', { correlationId, threadId, runId: run.id, error: errorMessage(err) })
      return null
    }

    for (const messageId of messageIds) {
      let message: ThreadMessage
      try {
        message = await this.client.getMessage(threadId, messageId)
      } catch (err) {
        log.warn('message_fetch_failed', { correlationId, threadId, messageId, error: errorMessage(err) })
        continue
      }
      const text = extractAssistantText(message)
      if (text) return text
    }
    return null
  }

  private async fromThreadScan(threadId: string): Promise<string | null> {
    const messages = await this.client.listMessages(threadId, { order: 'desc', limit: this.opts.messageScanLimit })
    for (const message of messages) {
      const text = extractAssistantText(message)
      if (text) return text
    }
    return null
  }
}
