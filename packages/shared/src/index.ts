export * from './assistant-bridge'
