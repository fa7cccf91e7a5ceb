import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // chokidar and playwright keep handles open; forks exit cleanly
    pool: "forks",
  },
});
