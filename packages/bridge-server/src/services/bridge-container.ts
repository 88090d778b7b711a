import type { AssistantRemoteClient } from './assistant-client'
import { getBridgeConfig } from './bridge-config'
import { OpenAIAssistantClient } from './openai-assistant-client'
import { TurnOrchestrator } from './turn-orchestrator'

export type BridgeServices = {
  client: AssistantRemoteClient
  orchestrator: TurnOrchestrator
}

let cached: BridgeServices | null = null

export function createBridgeServices(client: AssistantRemoteClient): BridgeServices {
  const config = getBridgeConfig()
  if (!config.assistantId) {
    throw new Error('ASSISTANT_ID is not configured')
  }
  const orchestrator = new TurnOrchestrator({
    client,
    assistantId: config.assistantId,
    fallbackModel: config.fallbackModel,
    nonCompletedPolicy: config.nonCompletedPolicy,
    pollIntervalMs: config.pollIntervalMs,
    pollTimeoutMs: config.pollTimeoutMs,
    maxPollAttempts: config.maxPollAttempts,
    stepListLimit: config.stepListLimit,
    messageScanLimit: config.messageScanLimit
  })
  return { client, orchestrator }
}

export function getBridgeServices(): BridgeServices {
  if (cached) return cached
  const config = getBridgeConfig()
  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY is not configured')
  }
  cached = createBridgeServices(OpenAIAssistantClient.fromApiKey(config.openaiApiKey))
  return cached
}

export function setBridgeServices(services: BridgeServices) {
  cached = services
}

export function resetBridgeServices() {
  cached = null
}
