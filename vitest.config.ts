import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared-utils/tests/**/*.test.ts", "collector/tests/**/*.test.ts"],
  },
});
