import { z } from 'zod'
import { NonCompletedPolicyEnum } from '@assistant-bridge/shared'
import { getDefaultModelName } from '../utils/model'

const positiveIntWithDefault = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback)

const BridgeEnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  ASSISTANT_ID: z.string().min(1).optional(),
  BRIDGE_POLL_INTERVAL_MS: positiveIntWithDefault(600),
  BRIDGE_POLL_TIMEOUT_MS: positiveIntWithDefault(120_000),
  BRIDGE_MAX_POLL_ATTEMPTS: z.coerce.number().int().positive().optional(),
  BRIDGE_STEP_LIST_LIMIT: positiveIntWithDefault(50),
  BRIDGE_MESSAGE_SCAN_LIMIT: positiveIntWithDefault(25),
  BRIDGE_NON_COMPLETED_POLICY: NonCompletedPolicyEnum.default('fallback_to_stateless'),
  CORS_ALLOW_ORIGINS: z.string().default('*')
})

export type BridgeConfig = {
  openaiApiKey: string | null
  assistantId: string | null
  fallbackModel: string
  pollIntervalMs: number
  pollTimeoutMs: number
  maxPollAttempts: number | null
  stepListLimit: number
  messageScanLimit: number
  nonCompletedPolicy: z.infer<typeof NonCompletedPolicyEnum>
  corsAllowOrigins: string[]
}

// Blank strings count as unset so `.env` placeholders like `ASSISTANT_ID=` fall back to defaults.
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const key of Object.keys(BridgeEnvSchema.shape)) {
    const value = env[key]
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim()
  }
  return out
}

export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = BridgeEnvSchema.safeParse(pickDefined(env))
  if (!parsed.success) {
    throw new Error(`Invalid bridge configuration: ${parsed.error.message}`)
  }
  const e = parsed.data
  return {
    openaiApiKey: e.OPENAI_API_KEY ?? null,
    assistantId: e.ASSISTANT_ID ?? null,
    fallbackModel: getDefaultModelName(env),
    pollIntervalMs: e.BRIDGE_POLL_INTERVAL_MS,
    pollTimeoutMs: e.BRIDGE_POLL_TIMEOUT_MS,
    maxPollAttempts: e.BRIDGE_MAX_POLL_ATTEMPTS ?? null,
    stepListLimit: e.BRIDGE_STEP_LIST_LIMIT,
    messageScanLimit: e.BRIDGE_MESSAGE_SCAN_LIMIT,
    nonCompletedPolicy: e.BRIDGE_NON_COMPLETED_POLICY,
    corsAllowOrigins: e.CORS_ALLOW_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean)
  }
}

// Returns the names of required variables that production refuses to boot without.
export function missingProductionVariables(config: BridgeConfig): string[] {
  const missing: string[] = []
  if (!config.openaiApiKey) missing.push('OPENAI_API_KEY')
  if (!config.assistantId) missing.push('ASSISTANT_ID')
  return missing
}

export function assertBootConfig(config: BridgeConfig, nodeEnv: string | undefined) {
  if (nodeEnv !== 'production') return
  const missing = missingProductionVariables(config)
  if (missing.length > 0) {
    throw new Error(`[assistant-bridge] Missing required environment variables in production: ${missing.join(', ')}`)
  }
}

let cached: BridgeConfig | null = null

export function getBridgeConfig(): BridgeConfig {
  if (cached) return cached
  cached = loadBridgeConfig()
  return cached
}

export function resetBridgeConfig() {
  cached = null
}
