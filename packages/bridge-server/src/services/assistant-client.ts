import type {
  AssistantRun,
  CompletionMessage,
  CompletionResult,
  RunStep,
  ThreadMessage
} from '@assistant-bridge/shared'

export type ListOrder = 'asc' | 'desc'

export type ListOptions = {
  order: ListOrder
  limit: number
}

/**
 * Capabilities the bridge needs from the remote assistant service. Every method may
 * reject (typically with RemoteCallError or MalformedRemoteResponseError); callers
 * decide which failures they downgrade.
 */
export interface AssistantRemoteClient {
  createThread(): Promise<{ id: string }>
  appendMessage(threadId: string, role: 'user', text: string): Promise<ThreadMessage>
  startRun(threadId: string, assistantId: string): Promise<AssistantRun>
  getRun(threadId: string, runId: string): Promise<AssistantRun>
  listRunSteps(threadId: string, runId: string, opts: ListOptions): Promise<RunStep[]>
  getMessage(threadId: string, messageId: string): Promise<ThreadMessage>
  listMessages(threadId: string, opts: ListOptions): Promise<ThreadMessage[]>
  /** Stateless single-shot completion; no thread or run semantics. */
  complete(model: string, messages: CompletionMessage[]): Promise<CompletionResult>
}
