import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

// Use fileURLToPath for ESM compatibility when running from workspace root
const __filename = fileURLToPath(import.meta.url);
const __dirname = resolve(__filename, "..");

export default defineConfig({
  resolve: {
    alias: {
      "@cipherscore/engine": resolve(__dirname, "../engine/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist", ".git"],
    pool: "threads",
    hookTimeout: 60_000,
    testTimeout: 60_000,
    teardownTimeout: 10_000,
  },
});
