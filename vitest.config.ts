import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const source = (path: string): string =>
  fileURLToPath(new URL(`./packages/irdump/src/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "test/**/*.test.ts"],
  },
  resolve: {
    alias: [
      { find: /^#errors$/, replacement: source("errors.ts") },
      { find: /^#result$/, replacement: source("result.ts") },
      { find: /^#ir$/, replacement: source("ir/index.ts") },
      { find: /^#ir\/spec$/, replacement: source("ir/spec/index.ts") },
      { find: /^#ir\/analysis$/, replacement: source("ir/analysis/index.ts") },
      { find: /^#loader$/, replacement: source("loader/index.ts") },
      { find: /^#cli$/, replacement: source("cli/index.ts") },
    ],
  },
});
