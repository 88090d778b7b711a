import { config as loadDotenv } from 'dotenv'
import { resolve } from 'node:path'
import { defineNitroPlugin } from 'nitropack/runtime'
import { assertBootConfig, getBridgeConfig, resetBridgeConfig } from '../../src/services/bridge-config'
import { getLogger } from '../../src/services/logger'

// Plugins load alphabetically, so this runs before the logger is first created.
// `.env.local` values override `.env`.
function loadEnvFiles(dirs: string[]) {
  for (const dir of dirs) {
    loadDotenv({ path: resolve(dir, '.env'), override: false })
    loadDotenv({ path: resolve(dir, '.env.local'), override: true })
  }
}

export default defineNitroPlugin(() => {
  loadEnvFiles([process.cwd(), resolve(process.cwd(), '..', '..')])
  resetBridgeConfig()

  // Malformed BRIDGE_* values fail the boot rather than the first turn
  const config = getBridgeConfig()
  assertBootConfig(config, process.env.NODE_ENV)
  getLogger().info('bridge_config_loaded', {
    nonCompletedPolicy: config.nonCompletedPolicy,
    pollIntervalMs: config.pollIntervalMs,
    pollTimeoutMs: config.pollTimeoutMs,
    maxPollAttempts: config.maxPollAttempts
  })
})
