import { defineConfig } from "vitest/config";

import { aliases } from "./vitest.aliases";

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    server: {
      deps: {
        inline: [/@murmur\/.*/],
      },
    },
  },
});
