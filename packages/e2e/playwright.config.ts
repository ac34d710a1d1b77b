import { defineConfig } from '@playwright/test'

// Every spec starts its own mock server on an ephemeral port; no browser is used.
export default defineConfig({
  testDir: './tests',
  reporter: 'list',
  timeout: 60_000,
})
