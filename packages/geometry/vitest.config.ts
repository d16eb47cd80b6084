import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "geometry",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
