import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 30_000,
    server: {
      deps: {
        inline: [/@indexflow\//],
      },
    },
  },
});
