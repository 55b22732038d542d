import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "server/tests/**/*.test.ts",
      "packages/**/__tests__/**/*.test.ts",
    ],
  },
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
      "@core": fileURLToPath(new URL("./packages/core", import.meta.url)),
    },
  },
});
