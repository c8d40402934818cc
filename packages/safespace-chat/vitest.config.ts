import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "chat",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
