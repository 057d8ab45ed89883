import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    target: "node20",
  },
  test: {
    include: ["core/**/*.test.ts"],
    pool: "forks",
  },
});
