import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Config tests chdir into temp directories, which worker threads do not allow.
    pool: 'forks',
  },
});
