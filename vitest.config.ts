import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdr-service/src/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
