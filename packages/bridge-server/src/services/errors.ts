import type { ZodIssue } from 'zod'

// Caller misuse; the only turn failure allowed to reach the HTTP layer.
export class InvalidTurnRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidTurnRequestError'
  }
}

export class RemoteCallError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options)
    this.name = 'RemoteCallError'
  }
}

export class MalformedRemoteResponseError extends Error {
  constructor(
    public readonly operation: string,
    public readonly issues: ZodIssue[] = []
  ) {
    const summary = issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    super(`Malformed ${operation} response${summary ? `: ${summary}` : ''}`)
    this.name = 'MalformedRemoteResponseError'
  }
}

export class RunPollTimeoutError extends Error {
  constructor(
    public readonly runId: string,
    public readonly attempts: number,
    public readonly elapsedMs: number
  ) {
    super(`Run ${runId} did not reach a terminal status after ${attempts} attempts (${elapsedMs}ms)`)
    this.name = 'RunPollTimeoutError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
