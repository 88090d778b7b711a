import OpenAI from 'openai'
import { z } from 'zod'
import {
  RunStatusEnum,
  type AssistantRun,
  type CompletionMessage,
  type CompletionResult,
  type MessagePart,
  type MessageRole,
  type RunStep,
  type ThreadMessage
} from '@assistant-bridge/shared'
import type { AssistantRemoteClient, ListOptions } from './assistant-client'
import { errorMessage, MalformedRemoteResponseError, RemoteCallError } from './errors'
import { getLogger } from './logger'

/**
 * Raw calls into the assistant service. Results are left untyped on purpose: the
 * client validates every payload before it reaches the orchestrator.
 */
export interface AssistantsTransport {
  createThread(): Promise<unknown>
  createMessage(threadId: string, body: { role: 'user'; content: string }): Promise<unknown>
  createRun(threadId: string, body: { assistant_id: string }): Promise<unknown>
  retrieveRun(threadId: string, runId: string): Promise<unknown>
  listRunSteps(threadId: string, runId: string, query: ListOptions): Promise<unknown[]>
  retrieveMessage(threadId: string, messageId: string): Promise<unknown>
  listMessages(threadId: string, query: ListOptions): Promise<unknown[]>
  createResponse(body: { model: string; input: CompletionMessage[] }): Promise<unknown>
}

export function createSdkTransport(openai: OpenAI): AssistantsTransport {
  const threads = openai.beta.threads
  return {
    createThread: () => threads.create(),
    createMessage: (threadId, body) => threads.messages.create(threadId, body),
    createRun: (threadId, body) => threads.runs.create(threadId, body),
    retrieveRun: (threadId, runId) => threads.runs.retrieve(threadId, runId),
    listRunSteps: async (threadId, runId, query) => (await threads.runs.steps.list(threadId, runId, query)).data,
    retrieveMessage: (threadId, messageId) => threads.messages.retrieve(threadId, messageId),
    listMessages: async (threadId, query) => (await threads.messages.list(threadId, query)).data,
    createResponse: (body) => openai.responses.create(body)
  }
}

const RawThreadSchema = z.object({ id: z.string().min(1) })

const RawRunSchema = z.object({
  id: z.string().min(1),
  thread_id: z.string().optional(),
  status: RunStatusEnum,
  last_error: z
    .object({ code: z.string(), message: z.string() })
    .nullish()
})

const RawStepSchema = z.object({
  id: z.string(),
  type: z.string(),
  step_details: z
    .object({
      message_creation: z.object({ message_id: z.string().nullish() }).nullish()
    })
    .passthrough()
    .nullish()
})

// Message content parts carry text as { value }; response output parts carry a plain string.
const RawPartSchema = z
  .object({
    type: z.string(),
    text: z.union([z.string(), z.object({ value: z.string().nullish() }).passthrough()]).nullish()
  })
  .passthrough()

const RawMessageSchema = z.object({
  id: z.string(),
  role: z.string(),
  content: z.array(RawPartSchema).nullish()
})

const RawResponseSchema = z.object({
  output_text: z.string().nullish(),
  output: z
    .array(
      z
        .object({
          type: z.string(),
          content: z.array(RawPartSchema).nullish()
        })
        .passthrough()
    )
    .nullish()
})

function normalizePart(part: z.infer<typeof RawPartSchema>): MessagePart {
  const raw = part.text
  const text = typeof raw === 'string' ? raw : raw?.value ?? null
  return { type: part.type, text }
}

function normalizeRole(role: string): MessageRole {
  return role === 'user' || role === 'assistant' ? role : 'other'
}

function toMessage(raw: z.infer<typeof RawMessageSchema>): ThreadMessage {
  return {
    id: raw.id,
    role: normalizeRole(raw.role),
    parts: (raw.content ?? []).map(normalizePart)
  }
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, operation: string, payload: unknown): z.infer<S> {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw new MalformedRemoteResponseError(operation, parsed.error.issues)
  }
  return parsed.data
}

export class OpenAIAssistantClient implements AssistantRemoteClient {
  constructor(private readonly transport: AssistantsTransport) {}

  static fromApiKey(apiKey: string) {
    return new OpenAIAssistantClient(createSdkTransport(new OpenAI({ apiKey })))
  }

  async createThread(): Promise<{ id: string }> {
    const raw = await this.call('createThread', () => this.transport.createThread())
    const thread = parseOrThrow(RawThreadSchema, 'createThread', raw)
    return { id: thread.id }
  }

  async appendMessage(threadId: string, role: 'user', text: string): Promise<ThreadMessage> {
    const raw = await this.call('appendMessage', () => this.transport.createMessage(threadId, { role, content: text }))
    return toMessage(parseOrThrow(RawMessageSchema, 'appendMessage', raw))
  }

  async startRun(threadId: string, assistantId: string): Promise<AssistantRun> {
    const raw = await this.call('startRun', () => this.transport.createRun(threadId, { assistant_id: assistantId }))
    return this.toRun('startRun', threadId, raw)
  }

  async getRun(threadId: string, runId: string): Promise<AssistantRun> {
    const raw = await this.call('getRun', () => this.transport.retrieveRun(threadId, runId))
    return this.toRun('getRun', threadId, raw)
  }

  async listRunSteps(threadId: string, runId: string, opts: ListOptions): Promise<RunStep[]> {
    const rawSteps = await this.call('listRunSteps', () => this.transport.listRunSteps(threadId, runId, opts))
    const steps: RunStep[] = []
    for (const raw of rawSteps) {
      const parsed = RawStepSchema.safeParse(raw)
      if (!parsed.success) {
        this.reportMalformed('listRunSteps', new MalformedRemoteResponseError('listRunSteps', parsed.error.issues))
        continue
      }
      const step = parsed.data
      if (step.type !== 'message_creation') {
        steps.push({ kind: 'other', id: step.id, type: step.type })
        continue
      }
      const messageId = step.step_details?.message_creation?.message_id
      if (!messageId) {
        this.reportMalformed(
          'listRunSteps',
          new MalformedRemoteResponseError('listRunSteps', [
            { code: 'custom', path: ['step_details', 'message_creation', 'message_id'], message: `missing on step ${step.id}` }
          ])
        )
        continue
      }
      steps.push({ kind: 'message_creation', id: step.id, messageId })
    }
    return steps
  }

  async getMessage(threadId: string, messageId: string): Promise<ThreadMessage> {
    const raw = await this.call('getMessage', () => this.transport.retrieveMessage(threadId, messageId))
    return toMessage(parseOrThrow(RawMessageSchema, 'getMessage', raw))
  }

  async listMessages(threadId: string, opts: ListOptions): Promise<ThreadMessage[]> {
    const rawMessages = await this.call('listMessages', () => this.transport.listMessages(threadId, opts))
    const messages: ThreadMessage[] = []
    for (const raw of rawMessages) {
      const parsed = RawMessageSchema.safeParse(raw)
      if (!parsed.success) {
        this.reportMalformed('listMessages', new MalformedRemoteResponseError('listMessages', parsed.error.issues))
        continue
      }
      messages.push(toMessage(parsed.data))
    }
    return messages
  }

  async complete(model: string, messages: CompletionMessage[]): Promise<CompletionResult> {
    const raw = await this.call('complete', () => this.transport.createResponse({ model, input: messages }))
    const res = parseOrThrow(RawResponseSchema, 'complete', raw)
    return {
      outputText: res.output_text ?? null,
      output: (res.output ?? []).map((item) => ({
        type: item.type,
        content: (item.content ?? []).map(normalizePart)
      }))
    }
  }

  private toRun(operation: string, threadId: string, raw: unknown): AssistantRun {
    const run = parseOrThrow(RawRunSchema, operation, raw)
    return {
      id: run.id,
      threadId: run.thread_id ?? threadId,
      status: run.status,
      lastError: run.last_error ?? null
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw new RemoteCallError(operation, errorMessage(err), { cause: err })
    }
  }

  private reportMalformed(operation: string, err: MalformedRemoteResponseError) {
    getLogger().warn('remote_response_malformed', { operation, error: err.message })
  }
}
