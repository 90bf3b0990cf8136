import { defineConfig } from 'vitest/config';

// Only the pure helpers under src/lib are unit-tested; no DOM needed.
export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        globals: true,
    },
});
