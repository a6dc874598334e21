import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      MONGODB_URI: 'mongodb://localhost:27017',
      COMPANY_NAME: 'Test Co',
      EMAIL_FROM: 'reports@example.com',
      REPORT_EMAIL_RETRY_DELAY_MS: '0'
    }
  }
});
