import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    clearMocks: true,
    unstubGlobals: true,

    // Drop dotenv tips from test output
    onConsoleLog(log: string) {
      if (/\[dotenv@/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      exclude: ["tests/**", "scripts/**", "dist/**"],
    },
  },
});
