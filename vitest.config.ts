import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // config/env.ts validates on import; give it a complete placeholder environment
    env: {
      NODE_ENV: 'test',
      CHANNELS: '@test-channel',
      SMTP_HOST: 'smtp.test.invalid',
      SMTP_USER: 'sender@test.invalid',
      SMTP_PASS: 'test-secret',
      MAIL_TO: 'listener@test.invalid',
      DATA_DIR: './data-test',
    },
    testTimeout: 10000,
    isolate: true,
    reporters: ['default'],
  },
});
