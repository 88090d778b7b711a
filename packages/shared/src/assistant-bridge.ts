import { z } from 'zod'

// Run lifecycle as reported by the remote assistant service.
export const RunStatusEnum = z.enum([
  'queued',
  'in_progress',
  'requires_action',
  'cancelling',
  'cancelled',
  'failed',
  'completed',
  'incomplete',
  'expired'
])
export type RunStatus = z.infer<typeof RunStatusEnum>

// Statuses that end the poll loop. Only 'completed' counts as success downstream;
// 'requires_action' is a pause on the remote side but is bucketed with the failures.
export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  'completed',
  'failed',
  'cancelled',
  'expired',
  'requires_action'
]

export function isTerminalRunStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.includes(status)
}

export const RunErrorSchema = z.object({
  code: z.string(),
  message: z.string()
})
export type RunError = z.infer<typeof RunErrorSchema>

export const AssistantRunSchema = z.object({
  id: z.string().min(1),
  threadId: z.string().min(1),
  status: RunStatusEnum,
  lastError: RunErrorSchema.nullable().default(null)
})
export type AssistantRun = z.infer<typeof AssistantRunSchema>

export const RunStepSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('message_creation'),
    id: z.string(),
    messageId: z.string().min(1)
  }),
  z.object({
    kind: z.literal('other'),
    id: z.string(),
    type: z.string()
  })
])
export type RunStep = z.infer<typeof RunStepSchema>

export type MessageRole = 'user' | 'assistant' | 'other'

// A content part with its text flattened; non-text parts carry `text: null`.
export type MessagePart = {
  type: string
  text: string | null
}

export type ThreadMessage = {
  id: string
  role: MessageRole
  parts: MessagePart[]
}

export type CompletionMessage = {
  role: 'system' | 'user' | 'assistant'
  content: string
}

// Stateless completion result: the aggregated text when the service provides one,
// plus the raw output items for a manual scan.
export type CompletionResult = {
  outputText: string | null
  output: Array<{ type: string; content: MessagePart[] }>
}

export const NonCompletedPolicyEnum = z.enum(['fallback_to_stateless', 'return_status_message'])
export type NonCompletedPolicy = z.infer<typeof NonCompletedPolicyEnum>

// HTTP contracts consumed by the conversational front-end.
export const ChatRequestSchema = z.object({
  thread_id: z.string().nullish().transform((v) => (v ?? '').trim()),
  message: z.string().nullish().transform((v) => (v ?? '').trim())
})
export type ChatRequest = z.infer<typeof ChatRequestSchema>

export const ChatResponseSchema = z.object({
  response: z.string()
})
export type ChatResponse = z.infer<typeof ChatResponseSchema>

export const StartThreadResponseSchema = z.union([
  z.object({ thread_id: z.string().min(1) }),
  z.object({ thread_id: z.null(), error: z.string() })
])
export type StartThreadResponse = z.infer<typeof StartThreadResponseSchema>

// Protocol tag served by the version route.
export const BRIDGE_PROTOCOL_VERSION = 'chat-steps-v3'
