import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["need-analysis/tests/**/*.test.ts"],
    environment: "node",
  },
});
