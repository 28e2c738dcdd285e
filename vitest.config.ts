import { defineConfig } from 'vitest/config'

// Workspace packages expose their TypeScript sources under the "source"
// export condition; the published "default" entry is the tsup build.
const conditions = ['source']

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30_000,
  },
})
