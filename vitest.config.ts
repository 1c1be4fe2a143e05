import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src'),
            '@lib': resolve(__dirname, './src/lib'),
            '@spec': resolve(__dirname, './spec'),
        },
    },
    test: {
        globals: false,
        environment: 'node',
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        testTimeout: 5000,
        hookTimeout: 5000,
    },
});
