import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@mailsift/utils": source("./packages/utils/src/index.ts"),
      "@mailsift/file-extract": source("./packages/file-extract/src/index.ts"),
    },
  },
});
