import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  {
    test: {
      name: 'packages',
      include: [
        'packages/*/src/__tests__/**/*.test.ts',
      ],
      environment: 'node',
    },
  },
  {
    test: {
      name: 'api',
      include: ['apps/atlas-api/src/__tests__/**/*.test.ts'],
      environment: 'node',
    },
  },
])
