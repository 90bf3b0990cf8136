/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Use Node environment — no DOM, no jsdom
        environment: 'node',

        // Glob patterns for test files
        include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],

        globals: true,

        // Coverage configuration (used with `npm run test:coverage`)
        coverage: {
            provider: 'v8',
            reporter: ['text', 'lcov'],
            include: ['src/lib/**/*.ts', 'src/services/**/*.ts'],
        },
    },
});
