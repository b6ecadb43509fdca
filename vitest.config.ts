import { defineConfig } from 'vitest/config';

// Dexie tests each open their own database name on fake-indexeddb.
export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
