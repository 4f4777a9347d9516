import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            // Workspace package resolved from its sources; `main` points at the build
            '@tidyfold/organizer-core': path.resolve(__dirname, 'packages/organizer-core/src/index.ts'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        testTimeout: 30000,
    },
});
