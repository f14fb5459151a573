import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages export built files; tests run against their sources.
    alias: {
      "@keyshift/shared": source("shared"),
      "@keyshift/core": source("core"),
      "@keyshift/rest-api": source("rest-api"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
