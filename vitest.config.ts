import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    env: {
      OPENAI_API_KEY: "test-key",
      QDRANT_URL: "http://localhost:6333",
      QDRANT_COLLECTION: "test-laws",
      ENABLE_INFRA_BOOTSTRAP: "false",
      ENABLE_ANALYSIS_AUDIT: "false",
      LOG_LEVEL: "error"
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/types.ts", "src/server.ts"]
    }
  }
});
