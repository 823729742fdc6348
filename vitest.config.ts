import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        env: {
            WORDSPLIT_RESOURCES_DIR: fileURLToPath(new URL('./tests/fixtures', import.meta.url)),
            WORDSPLIT_LOG_LEVEL: 'silent',
        },
    },
});
