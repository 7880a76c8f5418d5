import { defineConfig } from "vitest/config";

// DOM tests opt into jsdom with a `@vitest-environment jsdom` docblock
export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
