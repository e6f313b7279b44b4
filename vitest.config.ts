import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["typescript/packages/*/src/**/*.test.ts"],
  },
});
