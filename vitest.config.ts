import { defineConfig, coverageConfigDefaults } from "vitest/config";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const isCI = process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "@departure-board/core": resolve(__dirname, "packages/core/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules/**"],

    coverage: {
      provider: "v8",
      reporter: isCI ? ["text", "json", "lcov"] : ["text", "html"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        ...coverageConfigDefaults.exclude,
        "**/*.test.ts",
        "**/__tests__/**",
        "**/cli.ts",
        "**/index.ts",
      ],
      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
});
