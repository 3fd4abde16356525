import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      DOMAIN_LOOKUP_LANG: "en-US",
      LOG_LEVEL: "silent",
    },
  },
})
