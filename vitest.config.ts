import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            // Workspace packages resolve to their sources so tests need no build
            '@cdnscope/core/test-utils': fileURLToPath(
                new URL('./packages/core/src/logger/test-utils.ts', import.meta.url)
            ),
            '@cdnscope/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
    },
});
