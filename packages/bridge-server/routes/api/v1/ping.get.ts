import { defineEventHandler } from 'h3'
import type { ChatResponse } from '@assistant-bridge/shared'

// Lets front-end builders confirm they capture the `response` field.
export default defineEventHandler((): ChatResponse => ({ response: 'pong' }))
