import { setTimeout as delay } from 'node:timers/promises'
import { isTerminalRunStatus, type AssistantRun, type RunStatus } from '@assistant-bridge/shared'
import type { AssistantRemoteClient } from './assistant-client'
import { RunPollTimeoutError } from './errors'
import { getLogger } from './logger'

export type Sleeper = (ms: number) => Promise<void>
export type Clock = () => number

export const defaultSleeper: Sleeper = async (ms) => {
  await delay(ms)
}

export type RunPollerOptions = {
  intervalMs: number
  timeoutMs: number
  maxAttempts?: number | null
  sleep?: Sleeper
  now?: Clock
}

/**
 * Appends the user message, starts a run and polls it until the remote side reports
 * a terminal status. The deadline and optional attempt cap are mandatory guards;
 * crossing either raises RunPollTimeoutError.
 */
export class RunPoller {
  private readonly sleep: Sleeper
  private readonly now: Clock

  constructor(
    private readonly client: AssistantRemoteClient,
    private readonly opts: RunPollerOptions
  ) {
    this.sleep = opts.sleep ?? defaultSleeper
    this.now = opts.now ?? Date.now
  }

  async drive(threadId: string, assistantId: string, text: string, correlationId?: string): Promise<AssistantRun> {
    await this.client.appendMessage(threadId, 'user', text)
    const started = await this.client.startRun(threadId, assistantId)
    return this.waitForTerminal(threadId, started, correlationId)
  }

  async waitForTerminal(threadId: string, initial: AssistantRun, correlationId?: string): Promise<AssistantRun> {
    const log = getLogger()
    const startedAt = this.now()
    const maxAttempts = this.opts.maxAttempts ?? null
    let run = initial
    let lastStatus: RunStatus | null = null
    let attempts = 0

    for (;;) {
      run = await this.client.getRun(threadId, run.id)
      attempts += 1

      if (run.status !== lastStatus) {
        log.info('run_status', { correlationId, threadId, runId: run.id, status: run.status, attempt: attempts })
        lastStatus = run.status
      }

      if (isTerminalRunStatus(run.status)) {
        if (run.status === 'requires_action') {
          log.warn('run_requires_action', { correlationId, threadId, runId: run.id })
        }
        return run
      }

      const elapsedMs = this.now() - startedAt
      if (elapsedMs + this.opts.intervalMs > this.opts.timeoutMs || (maxAttempts !== null && attempts >= maxAttempts)) {
        log.warn('run_poll_timeout', { correlationId, threadId, runId: run.id, status: run.status, attempts, elapsedMs })
        throw new RunPollTimeoutError(run.id, attempts, elapsedMs)
      }

      await this.sleep(this.opts.intervalMs)
    }
  }
}
