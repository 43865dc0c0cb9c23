import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["Backend/tests/**/*.spec.ts"],
    environment: "node",
    restoreMocks: true,
  },
});
