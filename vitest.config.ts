import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '~': path.resolve(__dirname, 'src'),
        },
    },
    test: {
        include: [ 'test/**/*.spec.ts' ],
        setupFiles: [ 'test/setup.ts' ],
        testTimeout: 15000,
    },
});
