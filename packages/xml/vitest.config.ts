import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tagweave/xml",
    globals: true,
    environment: "node",
  },
});
