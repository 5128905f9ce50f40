import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["ml/**/__tests__/**/*.test.ts"],
  },
});
