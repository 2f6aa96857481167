import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts"],
      thresholds: {
        // Numeric core and curve formulas should be fully exercised
        "src/math.ts": {
          statements: 95,
          branches: 90,
          functions: 100,
        },
        "src/curve.ts": {
          statements: 95,
          branches: 90,
          functions: 100,
        },
        "src/bancor.ts": {
          statements: 95,
          branches: 85,
          functions: 100,
        },
      },
    },
  },
});
