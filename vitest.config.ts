import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "school-enricher",
    include: ["school-enricher/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
  },
});
