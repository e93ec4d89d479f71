import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['core/src/**/*.test.ts', 'api/src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        env: {
            LOG_SILENT: '1',
        },
        testTimeout: 10000,
    },
    resolve: {
        alias: {
            '@booktrans/core': path.resolve(__dirname, './core/src/index.ts'),
        },
    },
});
