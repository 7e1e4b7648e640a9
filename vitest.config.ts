/**
 * Vitest configuration
 *
 * Every suite runs in-process: the app listens on an ephemeral port,
 * persistence is an in-memory store and logos are served by a local app.
 */
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    env: { NODE_ENV: "test" },
    include: ["spec/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 15000,
    hookTimeout: 15000,
  },
});
