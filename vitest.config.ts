import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000,
    server: {
      deps: {
        // load the package through its ESM build
        inline: ["@zxing/library"],
      },
    },
  },
});
