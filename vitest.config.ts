import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

// Front-end tests run under jsdom; server test files opt into the node
// environment with a `@vitest-environment node` docblock.
export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: "jsdom",
    setupFiles: ["./frontend/src/setupTests.ts"],
    include: ["frontend/src/**/*.test.{ts,tsx}", "server/src/**/*.test.ts"],
  },
});
