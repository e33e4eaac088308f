import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts', 'test/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/dirshelf/src/index.ts'],
        },
    },
    resolve: {
        alias: {
            '@dirshelf/cache': resolve('./packages/cache/src/index.ts'),
            '@dirshelf/catalog': resolve('./packages/catalog/src/index.ts'),
            '@dirshelf/cli': resolve('./packages/cli/src/index.ts'),
            '@dirshelf/config': resolve('./packages/config/src/index.ts'),
            '@dirshelf/download': resolve('./packages/download/src/index.ts'),
            '@dirshelf/http': resolve('./packages/http/src/index.ts'),
            '@dirshelf/scraper': resolve('./packages/scraper/src/index.ts'),
            '@dirshelf/session': resolve('./packages/session/src/index.ts'),
            '@dirshelf/types': resolve('./packages/types/src/index.ts'),
            '@dirshelf/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
