import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // builder and server tests spawn /bin/sh
    testTimeout: 20_000,
  },
});
