import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["scripts/**/*.test.ts"],
    // executor tests spawn real child processes
    testTimeout: 15_000,
  },
});
