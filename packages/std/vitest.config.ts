import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "std",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
