import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "shared",
          root: "./shared",
          include: ["src/**/*.test.ts"],
        },
      },
      {
        resolve: {
          alias: {
            "@refdata/shared": new URL("./shared/src/index.ts", import.meta.url).pathname,
          },
        },
        test: {
          name: "service",
          root: "./service",
          include: ["src/**/*.test.ts"],
          testTimeout: 10_000,
        },
      },
    ],
  },
});
