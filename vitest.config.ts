import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // CLI tests spawn the entry point through tsx
    testTimeout: 60_000,
  },
});
