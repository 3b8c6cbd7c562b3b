import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["extractor/src/**/*.test.ts"],
    environment: "node",
  },
});
