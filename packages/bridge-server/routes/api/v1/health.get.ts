import { defineEventHandler } from 'h3'
import { getBridgeConfig } from '../../../src/services/bridge-config'
import { errorMessage } from '../../../src/services/errors'
import { getLogger } from '../../../src/services/logger'

export default defineEventHandler(() => {
  const now = new Date().toISOString()
  const uptime = process.uptime()
  const log = getLogger()

  let openaiConfigured = false
  let assistantConfigured = false
  let configError: string | undefined
  try {
    const config = getBridgeConfig()
    openaiConfigured = Boolean(config.openaiApiKey)
    assistantConfigured = Boolean(config.assistantId)
  } catch (err) {
    configError = errorMessage(err)
  }

  const status = openaiConfigured && assistantConfigured ? 'healthy' : 'degraded'
  log.info('health_probe', { status, openaiConfigured, assistantConfigured })

  return {
    status,
    timestamp: now,
    uptimeSeconds: Math.round(uptime),
    services: {
      openai: { configured: openaiConfigured },
      assistant: { configured: assistantConfigured }
    },
    ...(configError ? { error: configError } : {}),
    env: {
      nodeEnv: process.env.NODE_ENV || 'development'
    }
  }
})
