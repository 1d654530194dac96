import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@app': fromRoot('./src/app'),
            '@core': fromRoot('./src/app/core'),
            '@services': fromRoot('./src/app/services'),
            '@shared': fromRoot('./src/app/shared'),
            '@env': fromRoot('./src/environments'),
        },
    },
    test: {
        environment: 'node',
        include: ['src/**/*.spec.ts'],
        restoreMocks: true,
        unstubGlobals: true,
    },
});
