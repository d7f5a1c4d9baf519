import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
    root: 'frontend',
    plugins: [react()],
    build: {
        outDir: '../dist',
        emptyOutDir: true,
    },
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
    },
});
