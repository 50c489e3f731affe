import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    environment: 'node',
    // config/env.ts validates process.env on import
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret-for-vitest',
      ODOO_URL: 'http://odoo.test',
      ODOO_DB: 'testdb',
      ODOO_TIMEOUT_MS: '2000',
      ODOO_WRITE_TIMEOUT_MS: '2000',
      CONNECTION_ADMIN_TOKEN: 'test-admin-token-0001',
    },
    restoreMocks: true,
    unstubGlobals: true,
  },
});
