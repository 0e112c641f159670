import { defineConfig } from "vitest/config";
import { resolve } from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      LOG_SILENT: "true",
      LOG_LEVEL: "debug",
    },
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "text-summary"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "dist/", "**/*.d.ts", "**/*.config.ts", "tests/**"],
    },
    pool: "threads",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
