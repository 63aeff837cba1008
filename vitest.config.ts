import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(rootDir, "src")
    }
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.{ts,tsx}", "cli/**/*.test.ts"],
    reporters: "default",
    testTimeout: 30000
  }
});
