import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Tests stub the global fetch; keep files isolated from each other.
    restoreMocks: true,
    unstubGlobals: true,
  },
});
