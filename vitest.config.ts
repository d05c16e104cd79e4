import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    // config.ts validates the environment at import time
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      HUB_HOST: "127.0.0.1",
      HUB_USERNAME: "hub",
      HUB_PASSWORD: "test-secret",
      ENABLE_SUBSCRIBER: "false",
    },
  },
});
