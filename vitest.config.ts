import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules/**', 'dist/**'],
        env: {
            LOG_SILENT: 'true',
        },
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts'],
        },
    },
});
