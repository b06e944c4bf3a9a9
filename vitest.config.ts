import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "jce-codec",
    include: ["typescript/src/**/*.test.ts", "tests/integration/ts/**/*.test.ts"],
  },
});
