import { createRequire } from 'node:module';
import { defineConfig } from 'vitest/config';

const require = createRequire(import.meta.url);

export default defineConfig({
  resolve: {
    // The project compiles to CommonJS; resolve `ws` to its CJS entry (which
    // exposes `WebSocket.Server`) rather than the ESM wrapper.
    alias: [{ find: /^ws$/, replacement: require.resolve('ws') }]
  },
  test: {
    include: ['src/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent',
      LOG_FORMAT: 'json'
    }
  }
});
