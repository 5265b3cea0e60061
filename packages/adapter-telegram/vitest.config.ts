import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "adapter-telegram",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
})
