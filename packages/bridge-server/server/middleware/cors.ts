import { defineEventHandler, getHeader, sendNoContent, setHeader } from 'h3'
import { getBridgeConfig } from '../../src/services/bridge-config'

export function isOriginAllowed(origin: string, allowlist: readonly string[]) {
  if (!origin) return false
  if (allowlist.includes('*')) return true
  return allowlist.includes(origin)
}

export default defineEventHandler((event) => {
  const path = event.path || ''
  if (!path.startsWith('/api/')) return

  const origin = getHeader(event, 'origin') || ''
  if (!isOriginAllowed(origin, getBridgeConfig().corsAllowOrigins)) {
    // No CORS headers for non-allowed or non-CORS requests
    return
  }

  setHeader(event, 'Vary', 'Origin')
  setHeader(event, 'Access-Control-Allow-Origin', origin)
  setHeader(event, 'Access-Control-Allow-Credentials', 'true')
  setHeader(event, 'Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
  setHeader(
    event,
    'Access-Control-Allow-Headers',
    getHeader(event, 'access-control-request-headers') || 'accept,content-type,x-correlation-id'
  )
  setHeader(event, 'Access-Control-Max-Age', 600)

  if (event.method === 'OPTIONS') {
    sendNoContent(event, 204)
  }
})
