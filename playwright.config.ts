import { defineConfig } from '@playwright/test';

// Plain unit tests: no browser projects or web server are configured
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.test.ts',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
});
