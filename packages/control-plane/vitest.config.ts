import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "control-plane",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
})
