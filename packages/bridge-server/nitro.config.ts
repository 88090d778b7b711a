import { defineNitroConfig } from 'nitropack/config'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const currentDir = dirname(fileURLToPath(import.meta.url))

export default defineNitroConfig({
  compatibilityDate: '2025-09-02',
  srcDir: '.',
  scanDirs: [currentDir, resolve(currentDir, 'server')],
  imports: false
})
