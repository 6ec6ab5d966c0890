import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tagweave/parser",
    globals: true,
    environment: "node",
  },
});
