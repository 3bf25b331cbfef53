import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Listed explicitly so each directory runs as its own project.
    projects: [
      'packages/http',
      'packages/store',
      'packages/errors',
      'packages/testing',
      'packages/pokedex',
      'apps/terminal',
    ],
  },
})
