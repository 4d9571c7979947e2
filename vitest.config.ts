import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.{git,cache,output,temp}/**'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      RESUME_FONT_DISCOVERY: 'false',
    },
    allowOnly: false,
    testTimeout: 30000,
    hookTimeout: 30000,
    passWithNoTests: false,
  },
})
