import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "math",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
