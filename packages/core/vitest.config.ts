import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polydispatch/core",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
