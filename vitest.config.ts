import { defineConfig } from 'vitest/config'

// Shared options; the projects themselves are listed in vitest.workspace.ts
export default defineConfig({
  test: {
    restoreMocks: true,
  },
})
