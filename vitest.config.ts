import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their sources, so tests need no build.
const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@geosite-probe/shared': source('shared'),
            '@geosite-probe/core': source('core'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/index.ts'],
        },
    },
});
