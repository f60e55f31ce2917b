import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@mqtt': fileURLToPath(new URL('./src/MQTT', import.meta.url)),
      '@utils': fileURLToPath(new URL('./src/Utils', import.meta.url)),
    },
  },
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
    restoreMocks: true,
  },
});
