import { defineEventHandler } from 'h3'
import { BRIDGE_PROTOCOL_VERSION } from '@assistant-bridge/shared'

export default defineEventHandler(() => ({ version: BRIDGE_PROTOCOL_VERSION }))
