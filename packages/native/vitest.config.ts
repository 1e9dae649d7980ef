import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@handlekit/native",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
