import type { Command } from "commander";
import { confirm, input, select } from "@inquirer/prompts";
import chalk from "chalk";
import {
  loadConfigFile,
  saveConfigFile,
  type ConfigFile,
  type EditorConfig,
  type LogLevel,
} from "@cellterm/config";
import { loadCliContext } from "../context.js";

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/** Label/value rows describing a resolved configuration. */
export const describeConfig = (config: EditorConfig): Array<[string, string]> => [
  ["Default kernel", config.defaultKernelName],
  ["Kernel start timeout", `${config.kernelStartTimeoutMs}ms`],
  ["Kernel status timeout", `${config.kernelStatusTimeoutMs}ms`],
  ["Jupyter server", config.jupyter.baseUrl],
  ["Jupyter token", config.jupyter.token ? "********" : "(not set)"],
  ["Log level", config.logLevel],
  ["Log file", config.logFile ?? "(none)"],
  ["Log queue capacity", String(config.logQueueCapacity)],
  ["Debug", config.debug ? "on" : "off"],
];

const isUrl = (value: string): boolean => {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
};

const promptForConfig = async (base: EditorConfig): Promise<ConfigFile> => {
  const defaultKernelName = await input({
    message: "Default kernel name",
    default: base.defaultKernelName,
    validate: (value) =>
      value && value.trim().length > 0 ? true : "Kernel name cannot be empty",
  });

  const baseUrl = await input({
    message: "Jupyter server URL",
    default: base.jupyter.baseUrl,
    validate: (value) => (isUrl(value.trim()) ? true : "Enter a valid URL"),
  });

  const token = await input({
    message: "Jupyter server token (leave blank to skip)",
    default: base.jupyter.token ?? "",
  });

  const logLevel = await select({
    message: "Log level",
    choices: LOG_LEVELS.map((level) => ({ name: level, value: level })),
    default: base.logLevel,
  });

  const debug = await confirm({
    message: "Enable debug mode?",
    default: base.debug,
  });

  return {
    defaultKernelName: defaultKernelName.trim(),
    kernelStartTimeoutMs: base.kernelStartTimeoutMs,
    kernelStatusTimeoutMs: base.kernelStatusTimeoutMs,
    logLevel,
    logFile: base.logFile,
    logQueueCapacity: base.logQueueCapacity,
    debug,
    jupyter: {
      baseUrl: baseUrl.trim(),
      token: token.trim() || undefined,
    },
  };
};

export const registerConfigCommand = (program: Command) => {
  const command = program
    .command("config")
    .description("Show or set up cellterm configuration");

  command
    .command("show", { isDefault: true })
    .description("Print the resolved configuration")
    .action(async () => {
      const { config, configFile } = await loadCliContext();
      console.log(`${chalk.dim("Config file")}: ${chalk.cyan(configFile)}`);
      for (const [label, value] of describeConfig(config)) {
        console.log(`${chalk.dim(label)}: ${chalk.white(value)}`);
      }
    });

  command
    .command("init")
    .description("Write the config file interactively")
    .action(async () => {
      const { config, configFile } = await loadCliContext();
      const existing = await loadConfigFile(configFile);
      if (existing) {
        const overwrite = await confirm({
          message: `Overwrite ${configFile}?`,
          default: true,
        });
        if (!overwrite) {
          console.log(chalk.dim("Configuration unchanged."));
          return;
        }
      }
      const saved = await saveConfigFile(await promptForConfig(config), configFile);
      console.log(
        `${chalk.green("✔")} Configuration saved to ${chalk.cyan(configFile)}`
      );
      console.log(
        `${chalk.dim("Default kernel")}: ${chalk.white(saved.defaultKernelName ?? config.defaultKernelName)}`
      );
    });
};
