import { defineConfig } from "vitest/config";

const sharedAlias = {
  "@fleetsight/shared": new URL("./shared/src/index.ts", import.meta.url).pathname,
};

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
        resolve: { alias: sharedAlias },
        test: {
          name: "engine",
          root: "./engine",
          include: ["src/**/*.test.ts"],
        },
      },
    ],
  },
});
