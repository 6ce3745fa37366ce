import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/applyflow/__tests__/**/*.test.ts'],
        env: {
            LOG_LEVEL: 'error',
        },
    },
});
