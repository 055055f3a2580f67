import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: false,
    // Tests stub OLLAMA_* / CSV_STORE_PATH and fetch per case
    unstubEnvs: true,
    unstubGlobals: true,
    // The console interceptor calls Date.now, which tests mock per case
    disableConsoleIntercept: true,
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
  // next/server is loaded by the route handler tests as-is
  optimizeDeps: {
    exclude: ["next", "next/server"],
  },
});
