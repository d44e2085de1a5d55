import path from "path";

import { defineConfig } from "vitest/config";

const alias = (dir: string): string => path.resolve(__dirname, "src", dir);

export default defineConfig({
  resolve: {
    alias: {
      "@app": alias("app"),
      "@config": alias("config"),
      "@domain": alias("domain"),
      "@infrastructure": alias("infrastructure"),
      "@interfaces": alias("interfaces"),
      "@middleware": alias("middleware"),
      "@routes": alias("routes"),
      "@typesLocal": alias("types"),
      "@utils": alias("utils"),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
      LOG_FILE: "",
    },
  },
});
