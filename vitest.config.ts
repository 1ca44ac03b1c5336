import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: {
      DATABASE_PATH: ':memory:',
      SESSION_SECRET: 'test-secret',
      BCRYPT_ROUNDS: '4',
      ADMIN_INITIAL_PASSWORD: 'admin123',
    },
  },
});
