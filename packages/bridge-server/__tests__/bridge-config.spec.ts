// @vitest-environment node
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  assertBootConfig,
  getBridgeConfig,
  loadBridgeConfig,
  missingProductionVariables,
  resetBridgeConfig
} from '../src/services/bridge-config'
import { DEFAULT_MODEL_FALLBACK, getDefaultModelName } from '../src/utils/model'

const defaults = {
  openaiApiKey: null,
  assistantId: null,
  fallbackModel: 'gpt-4o-mini',
  pollIntervalMs: 600,
  pollTimeoutMs: 120_000,
  maxPollAttempts: null,
  stepListLimit: 50,
  messageScanLimit: 25,
  nonCompletedPolicy: 'fallback_to_stateless',
  corsAllowOrigins: ['*']
}

describe('loadBridgeConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadBridgeConfig({})).toEqual(defaults)
  })

  it('treats blank values as unset', () => {
    expect(
      loadBridgeConfig({
        OPENAI_API_KEY: '',
        ASSISTANT_ID: '   ',
        BRIDGE_POLL_INTERVAL_MS: '',
        BRIDGE_POLL_TIMEOUT_MS: ' ',
        BRIDGE_MAX_POLL_ATTEMPTS: '',
        BRIDGE_STEP_LIST_LIMIT: '',
        BRIDGE_MESSAGE_SCAN_LIMIT: '  ',
        BRIDGE_NON_COMPLETED_POLICY: '',
        CORS_ALLOW_ORIGINS: ' '
      })
    ).toEqual(defaults)
  })

  it('reads explicit values', () => {
    const config = loadBridgeConfig({
      OPENAI_API_KEY: ' test-key ',
      ASSISTANT_ID: 'asst_test',
      OPENAI_DEFAULT_MODEL: 'gpt-test',
      BRIDGE_POLL_INTERVAL_MS: '250',
      BRIDGE_POLL_TIMEOUT_MS: '30000',
      BRIDGE_MAX_POLL_ATTEMPTS: '12',
      BRIDGE_STEP_LIST_LIMIT: '10',
      BRIDGE_MESSAGE_SCAN_LIMIT: '5',
      BRIDGE_NON_COMPLETED_POLICY: 'return_status_message'
    })

    expect(config).toEqual({
      openaiApiKey: 'test-key',
      assistantId: 'asst_test',
      fallbackModel: 'gpt-test',
      pollIntervalMs: 250,
      pollTimeoutMs: 30_000,
      maxPollAttempts: 12,
      stepListLimit: 10,
      messageScanLimit: 5,
      nonCompletedPolicy: 'return_status_message',
      corsAllowOrigins: ['*']
    })
  })

  it('splits and trims the CORS allowlist', () => {
    const config = loadBridgeConfig({ CORS_ALLOW_ORIGINS: ' https://a.test , ,https://b.test ' })

    expect(config.corsAllowOrigins).toEqual(['https://a.test', 'https://b.test'])
  })

  it.each([
    ['BRIDGE_POLL_INTERVAL_MS', 'abc'],
    ['BRIDGE_POLL_TIMEOUT_MS', '0'],
    ['BRIDGE_MAX_POLL_ATTEMPTS', '-3'],
    ['BRIDGE_STEP_LIST_LIMIT', '2.5'],
    ['BRIDGE_NON_COMPLETED_POLICY', 'retry']
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadBridgeConfig({ [key]: value })).toThrow(/^Invalid bridge configuration: /)
  })
})

describe('getDefaultModelName', () => {
  it('prefers OPENAI_DEFAULT_MODEL, then OPENAI_MODEL, then the built-in default', () => {
    expect(getDefaultModelName({ OPENAI_DEFAULT_MODEL: 'gpt-a', OPENAI_MODEL: 'gpt-b' })).toBe('gpt-a')
    expect(getDefaultModelName({ OPENAI_MODEL: 'gpt-b' })).toBe('gpt-b')
    expect(getDefaultModelName({})).toBe(DEFAULT_MODEL_FALLBACK)
  })

  it('skips whitespace-only model names', () => {
    expect(getDefaultModelName({ OPENAI_DEFAULT_MODEL: '   ', OPENAI_MODEL: ' gpt-b ' })).toBe('gpt-b')
    expect(getDefaultModelName({ OPENAI_DEFAULT_MODEL: ' ', OPENAI_MODEL: '' })).toBe('gpt-4o-mini')
  })
})

describe('assertBootConfig', () => {
  it('lists the missing required variables', () => {
    expect(missingProductionVariables(loadBridgeConfig({}))).toEqual(['OPENAI_API_KEY', 'ASSISTANT_ID'])
    expect(missingProductionVariables(loadBridgeConfig({ OPENAI_API_KEY: 'test-key' }))).toEqual(['ASSISTANT_ID'])
  })

  it('only enforces required variables in production', () => {
    const empty = loadBridgeConfig({})

    expect(() => assertBootConfig(empty, 'development')).not.toThrow()
    expect(() => assertBootConfig(empty, undefined)).not.toThrow()
    expect(() => assertBootConfig(empty, 'production')).toThrow(
      '[assistant-bridge] Missing required environment variables in production: OPENAI_API_KEY, ASSISTANT_ID'
    )
  })

  it('accepts a complete production configuration', () => {
    const config = loadBridgeConfig({ OPENAI_API_KEY: 'test-key', ASSISTANT_ID: 'asst_test' })

    expect(() => assertBootConfig(config, 'production')).not.toThrow()
  })
})

describe('getBridgeConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    resetBridgeConfig()
  })

  it('caches until reset', () => {
    vi.stubEnv('BRIDGE_POLL_INTERVAL_MS', '750')
    resetBridgeConfig()
    expect(getBridgeConfig().pollIntervalMs).toBe(750)

    vi.stubEnv('BRIDGE_POLL_INTERVAL_MS', '900')
    expect(getBridgeConfig().pollIntervalMs).toBe(750)

    resetBridgeConfig()
    expect(getBridgeConfig().pollIntervalMs).toBe(900)
  })
})
