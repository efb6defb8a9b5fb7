import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['backend/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
            LOG_TO_FILE: 'false',
            JWT_SECRET: 'test-secret',
            UPLOAD_DIR: path.join(os.tmpdir(), 'resume-import-test-uploads')
        }
    }
});
