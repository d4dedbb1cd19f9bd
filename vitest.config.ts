import { resolve } from "path";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const include = ["./src/**/*.test.ts"];
const exclude = ["./dist/**", "./node_modules/**"];

export default defineConfig({
  plugins: [
    tsconfigPaths({
      root: ".",
      projects: ["./tsconfig.json"],
      ignoreConfigErrors: true
    })
  ],
  resolve: {
    alias: {
      // src
      $core: resolve(__dirname, "./src/core"),
      $shared: resolve(__dirname, "./src/shared"),
      $infrastructure: resolve(__dirname, "./src/infrastructure"),
      // lib
      $commands: resolve(__dirname, "./src/lib/commands"),
      $lib: resolve(__dirname, "./src/lib"),
      $config: resolve(__dirname, "./src/lib/config"),
      $renderers: resolve(__dirname, "./src/lib/renderers"),
      // test
      $test: resolve(__dirname, "./src/test")
    }
  },
  test: {
    include,
    exclude,
    environment: "node",
    maxConcurrency: 10,
    passWithNoTests: false,
    isolate: true,
    silent: false,
    hideSkippedTests: true,
    name: "sitepull",
    printConsoleTrace: false,
    testTimeout: 30_000,
    env: {
      LOG_LEVEL: "silent"
    }
  }
});
