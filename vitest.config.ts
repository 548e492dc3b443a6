import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      MONGODB_URI: 'mongodb://127.0.0.1:27017/tailor-shop-test',
      JWT_ACCESS_SECRET: 'test-secret-test-secret',
      CSRF_SECRET: 'test-secret-test-secret',
      SEMAPHORE_API_KEY: 'test-secret',
      SHOP_NAME: 'Test Tailoring',
    },
  },
});
