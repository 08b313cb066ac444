import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against the SDK sources; its package entry is the compiled build
      "@hpvs-deploy/sdk": fileURLToPath(new URL("./packages/sdk/src/client/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
