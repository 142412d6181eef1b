import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["scripts/tests/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
  },
});
