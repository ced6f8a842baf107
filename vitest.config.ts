import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    globals: false,
    environment: "node",
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources
    alias: {
      "@breakprops/sdk": source("./packages/sdk/src/index.ts"),
      "@breakprops/testkit": source("./packages/testkit/src/index.ts"),
    },
  },
});
