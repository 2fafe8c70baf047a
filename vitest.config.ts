import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "services/*/src/**/*.test.ts"
    ],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "packages/*/src/**/*.ts",
        "services/*/src/**/*.ts"
      ],
      exclude: [
        "**/__tests__/**",
        "**/index.ts",
        "services/*/src/server.ts",
        "services/*/src/telemetry.ts",
        "services/*/src/layers.ts"
      ]
    }
  }
})
