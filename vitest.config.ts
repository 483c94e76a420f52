import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["apps/*/src/**/*.test.ts", "packages/*/src/**/*.test.ts"],
    fakeTimers: {
      toFake: [
        "setTimeout",
        "setInterval",
        "clearInterval",
        "clearTimeout",
        "Date",
      ],
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["apps/backend/src/camera/**/*.ts"],
      exclude: ["apps/backend/src/camera/__tests__/**"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
      },
    },
    setupFiles: ["./apps/backend/src/camera/__tests__/setup.ts"],
  },
});
