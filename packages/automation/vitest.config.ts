import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "automation",
    include: ["src/**/*.test.ts"],
    globals: true,
    testTimeout: 15_000,
    coverage: {
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/index.ts"],
    },
  },
});
