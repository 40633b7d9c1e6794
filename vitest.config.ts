import { fileURLToPath } from "node:url";
import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    env: {
      FINDERKIT_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.spec.ts", "**/testing/**"],
      reporter: ["text", "json", "html"],
    },
  },
  // swc instead of vite's esbuild: esbuild renames named function
  // expressions (`const f = function f() {}` becomes `f2`), which breaks .name
  plugins: [swc.vite({ jsc: { target: "es2022" } })],
  esbuild: false,
  resolve: {
    alias: [
      { find: /^@finderkit\/core\/testing$/, replacement: pkg("core/src/testing/index.ts") },
      { find: /^@finderkit\/core$/, replacement: pkg("core/src/index.ts") },
      { find: /^@finderkit\/shared$/, replacement: pkg("shared/src/index.ts") },
      // Strip .js from relative imports so vite resolves .ts source files
      { find: /^(\.{1,2}\/.*)\.js$/, replacement: "$1" },
    ],
  },
});
