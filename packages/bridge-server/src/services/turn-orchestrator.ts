import type { NonCompletedPolicy } from '@assistant-bridge/shared'
import type { AssistantRemoteClient } from './assistant-client'
import { describeOutcome, FallbackResponder, type NonSuccessOutcome } from './fallback-responder'
import { errorMessage, InvalidTurnRequestError, RunPollTimeoutError } from './errors'
import { genCorrelationId, getLogger } from './logger'
import { ReplyResolver } from './reply-resolver'
import { RunPoller, type Clock, type Sleeper } from './run-poller'

export const EMPTY_MESSAGE_REPLY = 'Tell me something to send to the assistant.'

export type TurnOrchestratorOptions = {
  client: AssistantRemoteClient
  assistantId: string
  fallbackModel: string
  nonCompletedPolicy?: NonCompletedPolicy
  pollIntervalMs?: number
  pollTimeoutMs?: number
  maxPollAttempts?: number | null
  stepListLimit?: number
  messageScanLimit?: number
  sleep?: Sleeper
  now?: Clock
}

/**
 * Submits one user message to a thread and always answers with displayable text.
 * Only an empty thread id escapes as an error; every remote failure becomes a string.
 */
export class TurnOrchestrator {
  private readonly poller: RunPoller
  private readonly resolver: ReplyResolver
  private readonly fallback: FallbackResponder
  private readonly assistantId: string
  readonly policy: NonCompletedPolicy

  constructor(opts: TurnOrchestratorOptions) {
    this.assistantId = opts.assistantId
    this.policy = opts.nonCompletedPolicy ?? 'fallback_to_stateless'
    this.poller = new RunPoller(opts.client, {
      intervalMs: opts.pollIntervalMs ?? 600,
      timeoutMs: opts.pollTimeoutMs ?? 120_000,
      maxAttempts: opts.maxPollAttempts ?? null,
      sleep: opts.sleep,
      now: opts.now
    })
    this.resolver = new ReplyResolver(opts.client, {
      stepListLimit: opts.stepListLimit ?? 50,
      messageScanLimit: opts.messageScanLimit ?? 25
    })
    this.fallback = new FallbackResponder(opts.client, opts.fallbackModel)
  }

  async submitTurn(threadId: string, message: string, correlationId: string = genCorrelationId()): Promise<string> {
    const tid = threadId.trim()
    if (!tid) {
      throw new InvalidTurnRequestError('Missing thread_id')
    }
    const text = message.trim()
    if (!text) {
      return EMPTY_MESSAGE_REPLY
    }

    const log = getLogger()
    try {
      const run = await this.poller.drive(tid, this.assistantId, text, correlationId)
      if (run.status === 'completed') {
        return await this.resolver.resolve(tid, run, correlationId)
      }
      return await this.handleNonSuccess(text, { kind: 'status', run }, correlationId)
    } catch (err) {
      if (err instanceof RunPollTimeoutError) {
        const outcome: NonSuccessOutcome = {
          kind: 'timeout',
          runId: err.runId,
          attempts: err.attempts,
          elapsedMs: err.elapsedMs
        }
        return this.handleNonSuccess(text, outcome, correlationId)
      }
      const reason = errorMessage(err)
      log.error('turn_failed', { correlationId, threadId: tid, error: reason })
      return `Internal error: ${reason}`
    }
  }

  private async handleNonSuccess(text: string, outcome: NonSuccessOutcome, correlationId: string): Promise<string> {
    if (this.policy === 'return_status_message') {
      return describeOutcome(outcome)
    }
    return this.fallback.respond(text, outcome, correlationId)
  }
}
