import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/**/*.{test,spec}.ts", "scripts/**/*.{test,spec}.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
})
