import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@swapvault/types": pkg("types"),
      "@swapvault/ledger": pkg("ledger"),
      "@swapvault/event-store": pkg("event-store"),
      "@swapvault/runtime": pkg("runtime"),
      "@swapvault/vault": pkg("vault"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/demo/src/**"],
    },
  },
});
