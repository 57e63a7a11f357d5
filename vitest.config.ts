import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['**/*.test.ts'],
        exclude: ['node_modules/**', 'dist/**'],
        // Each suite opens its own database file; keep them in one worker at a time.
        fileParallelism: false,
        testTimeout: 20000,
    },
});
