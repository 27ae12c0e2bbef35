import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@polydispatch/introspect",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
