import { defineConfig } from '@playwright/test';

// Unit and in-process HTTP tests only: no spec uses the page/browser fixtures,
// so no browser binaries are needed.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  timeout: 30_000,
});
