import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        env: {
            NODE_ENV: 'test',
        },
        environment: 'node',
        include: ['src/**/*.test.ts', '__tests__/**/*.test.ts'],
        restoreMocks: true,
    },
});
