// @vitest-environment node
import { describe, expect, it } from 'vitest'
import type { AssistantRun } from '@assistant-bridge/shared'
import { NO_ANSWER_REPLY, ReplyResolver, firstNonEmptyText } from '../src/services/reply-resolver'
import { FakeAssistantClient, assistantMessage, userMessage } from './helpers/fake-assistant-client'

const completedRun: AssistantRun = { id: 'run_1', threadId: 'thread_1', status: 'completed', lastError: null }

function makeResolver(client: FakeAssistantClient) {
  return new ReplyResolver(client, { stepListLimit: 50, messageScanLimit: 25 })
}

describe('ReplyResolver', () => {
  it('returns the text of the message created by the run', async () => {
    const client = new FakeAssistantClient()
    client.steps = [{ kind: 'message_creation', id: 'step_1', messageId: 'm1' }]
    client.messages.set('m1', assistantMessage('m1', 'hello'))

    const result = await makeResolver(client).resolveWithSource('thread_1', completedRun)

    expect(result).toEqual({ text: 'hello', source: 'run_steps' })
    expect(client.calls[0]).toEqual({ op: 'listRunSteps', args: ['thread_1', 'run_1', { order: 'asc', limit: 50 }] })
    expect(client.ops()).not.toContain('listMessages')
  })

  it('prefers the earliest assistant message with text', async () => {
    const client = new FakeAssistantClient()
    client.steps = [
      { kind: 'other', id: 'step_0', type: 'tool_calls' },
      { kind: 'message_creation', id: 'step_1', messageId: 'm1' },
      { kind: 'message_creation', id: 'step_2', messageId: 'm2' },
      { kind: 'message_creation', id: 'step_3', messageId: 'm3' }
    ]
    client.messages.set('m1', assistantMessage('m1', '', null))
    client.messages.set('m2', assistantMessage('m2', 'first reply'))
    client.messages.set('m3', assistantMessage('m3', 'second reply'))

    const text = await makeResolver(client).resolve('thread_1', completedRun)

    expect(text).toBe('first reply')
    expect(client.calls.filter((c) => c.op === 'getMessage').map((c) => c.args[1])).toEqual(['m1', 'm2'])
  })

  it('skips messages that are not from the assistant', async () => {
    const client = new FakeAssistantClient()
    client.steps = [
      { kind: 'message_creation', id: 'step_1', messageId: 'u1' },
      { kind: 'message_creation', id: 'step_2', messageId: 'm1' }
    ]
    client.messages.set('u1', userMessage('u1', 'question'))
    client.messages.set('m1', assistantMessage('m1', 'answer'))

    expect(await makeResolver(client).resolve('thread_1', completedRun)).toBe('answer')
  })

  it('continues past a message that cannot be fetched', async () => {
    const client = new FakeAssistantClient()
    client.steps = [
      { kind: 'message_creation', id: 'step_1', messageId: 'm1' },
      { kind: 'message_creation', id: 'step_2', messageId: 'm2' }
    ]
    client.messages.set('m1', assistantMessage('m1', 'unreachable'))
    client.messages.set('m2', assistantMessage('m2', 'reachable'))
    client.failingMessageIds.add('m1')

    expect(await makeResolver(client).resolve('thread_1', completedRun)).toBe('reachable')
  })

  it('falls back to the newest assistant message in the thread when there are no steps', async () => {
    const client = new FakeAssistantClient()
    client.threadMessages = [
      userMessage('u2', 'latest question'),
      assistantMessage('m9', 'fallback-text'),
      assistantMessage('m8', 'older reply')
    ]

    const result = await makeResolver(client).resolveWithSource('thread_1', completedRun)

    expect(result).toEqual({ text: 'fallback-text', source: 'thread_scan' })
    const scan = client.calls.find((c) => c.op === 'listMessages')
    expect(scan?.args).toEqual(['thread_1', { order: 'desc', limit: 25 }])
  })

  it('falls back to the thread scan when listing steps fails', async () => {
    const client = new FakeAssistantClient()
    client.failures.listRunSteps = new Error('steps unavailable')
    client.threadMessages = [assistantMessage('m1', 'from thread')]

    expect(await makeResolver(client).resolve('thread_1', completedRun)).toBe('from thread')
  })

  it('returns the sentinel when no candidate carries text', async () => {
    const client = new FakeAssistantClient()
    client.steps = [{ kind: 'message_creation', id: 'step_1', messageId: 'm1' }]
    client.messages.set('m1', assistantMessage('m1', '', null))
    client.threadMessages = [assistantMessage('m1', ''), assistantMessage('m0', null), userMessage('u1', 'hello')]

    const result = await makeResolver(client).resolveWithSource('thread_1', completedRun)

    expect(result).toEqual({ text: NO_ANSWER_REPLY, source: 'none' })
  })

  it('yields the same text on repeated resolution without writing to the thread', async () => {
    const client = new FakeAssistantClient()
    client.steps = [{ kind: 'message_creation', id: 'step_1', messageId: 'm1' }]
    client.messages.set('m1', assistantMessage('m1', 'stable'))
    const resolver = makeResolver(client)

    const first = await resolver.resolve('thread_1', completedRun)
    const second = await resolver.resolve('thread_1', completedRun)

    expect(first).toBe('stable')
    expect(second).toBe(first)
    expect(new Set(client.ops())).toEqual(new Set(['listRunSteps', 'getMessage']))
  })

  it('propagates a failing thread scan', async () => {
    const client = new FakeAssistantClient()
    client.failures.listMessages = new Error('scan failed')

    await expect(makeResolver(client).resolve('thread_1', completedRun)).rejects.toThrow('scan failed')
  })
})

describe('firstNonEmptyText', () => {
  it('takes the first part with a non-empty value', () => {
    expect(
      firstNonEmptyText([
        { type: 'image_file', text: null },
        { type: 'text', text: '' },
        { type: 'text', text: 'second' },
        { type: 'text', text: 'third' }
      ])
    ).toBe('second')
    expect(firstNonEmptyText([])).toBeNull()
  })
})
