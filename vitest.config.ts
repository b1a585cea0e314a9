import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolveWorkspace = (...segments: string[]): string => {
  const rootDir = fileURLToPath(new URL(".", import.meta.url));
  return path.resolve(rootDir, ...segments);
};

const packages = [
  "kernel-protocol",
  "kernel-session",
  "comms",
  "kernel-tab",
  "cell-selection",
  "log-queue",
  "config",
  "commands",
];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      packages.map((name) => [
        `@cellterm/${name}`,
        resolveWorkspace("packages", name, "src/index.ts"),
      ])
    ),
  },
  test: {
    environment: "node",
    globals: true,
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
  },
});
