import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include:     ['tests/**/*.test.ts'],
        exclude:     ['**/node_modules/**'],
        pool:        'forks',
        testTimeout: 10000,
        hookTimeout: 10000,
        env:         { LOG_LEVEL: 'silent' },
    },
});
