import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "unit",
          include: ["tests/**/*.test.ts"],
          exclude: ["tests/network/**"],
          testTimeout: 5_000,
        },
      },
      {
        // Loopback listeners on ephemeral ports; never leaves the host.
        test: {
          name: "network",
          include: ["tests/network/**/*.test.ts"],
          testTimeout: 15_000,
        },
      },
    ],
  },
});
