import react from "@vitejs/plugin-react";
import { defineConfig } from "vitest/config";

export default defineConfig({
  plugins: [react()],
  test: {
    environment: "jsdom",
    // fixture-reading tests run under node: in jsdom Vite rewrites
    // new URL(..., import.meta.url) into an http asset URL
    environmentMatchGlobs: [
      ["tests/search.test.ts", "node"],
      ["tests/solveMaze.test.ts", "node"],
    ],
    include: ["tests/**/*.test.{ts,tsx}"],
    setupFiles: ["tests/setup.ts"],
  },
});
