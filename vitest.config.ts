import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    unstubGlobals: true,

    // Reduce console spam from libs during tests
    onConsoleLog(log: string) {
      // dotenv prints tips when it loads a file
      if (/\[dotenv@/i.test(log) || /\[dotenvx@/i.test(log) || /injecting env/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },

    css: false,
    logHeapUsage: false,

    coverage: {
      provider: "v8",
      reporter: ["text", "json", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: ["tests/**", "**/*.test.ts", "src/main.ts", "dist/**"],
      thresholds: {
        lines: 70,
        functions: 65,
        branches: 60,
        statements: 70,
      },
    },
  },
});
