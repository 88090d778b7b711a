import { fileURLToPath } from 'node:url'
import { configDefaults, defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@assistant-bridge/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, '**/.output/**', '**/.nitro/**'],
    env: {
      LOG_SILENT: 'true'
    }
  }
})
