import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // the cluster pool forks processes; keep test files out of worker threads
        pool: 'forks',
        testTimeout: 30_000,
    },
});
