import { defineConfig } from 'vitest/config';
import path from 'path';
import react from '@vitejs/plugin-react';

export default defineConfig({
    plugins: [react()],
    test: {
        environment: 'jsdom',
        setupFiles: ['./test/setup.ts'],
        globals: true,
        include: ['client/src/**/*.test.ts?(x)', 'core/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@': path.resolve(import.meta.dirname, 'client/src'),
            '@core': path.resolve(import.meta.dirname, 'core'),
        },
    },
});
