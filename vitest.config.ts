import { defineConfig } from "vitest/config";
import { resolve } from "node:path";

const domainEntry = resolve(__dirname, "packages/domain/src/index.ts");

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@voltcast/domain": domainEntry,
    },
  },
  test: {
    pool: "forks",
    globals: true,
    include: ["packages/*/test/**/*.spec.ts", "backend/test/**/*.spec.ts"],
  },
});
