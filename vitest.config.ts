import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["loom/test/**/*.test.ts"],
    environment: "node",
  },
});
