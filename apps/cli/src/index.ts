#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import { registerConfigCommand } from "./commands/config.js";
import { registerKernelCommands } from "./commands/kernel.js";
import { registerKeysCommand } from "./commands/keys.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const pkg: unknown = require("../package.json");
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "0.0.0";
};

const program = new Command();

program
  .name("cellterm")
  .description("Notebook kernels from the terminal")
  .version(readVersion());

registerConfigCommand(program);
registerKernelCommands(program);
registerKeysCommand(program);

program.parseAsync(process.argv).catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
