import { defineConfig } from "@playwright/test";

/**
 * The suite is pure Node: no browser projects and no web server.
 */
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.test.ts",
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
  timeout: 30_000,
});
