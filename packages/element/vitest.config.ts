import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@handlekit/element",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
