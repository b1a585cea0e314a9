import type { Command } from "commander";
import chalk from "chalk";
import {
  JupyterServerClient,
  createJupyterServerConnector,
  type KernelInfoReplyContent,
} from "@cellterm/kernel-protocol";
import { KernelSession } from "@cellterm/kernel-session";
import { JupyterKernelSpecSource, type KernelSpecMap } from "@cellterm/kernel-tab";
import { loadCliContext } from "../context.js";

interface ServerOptions {
  url?: string;
  token?: string;
}

interface InfoOptions extends ServerOptions {
  kernel?: string;
  kernelId?: string;
}

export const describeKernelInfo = (
  info: KernelInfoReplyContent
): Array<[string, string]> => {
  const rows: Array<[string, string]> = [];
  const join = (...parts: Array<string | undefined>) =>
    parts.filter((part): part is string => Boolean(part)).join(" ");
  const implementation = join(info.implementation, info.implementation_version);
  if (implementation) rows.push(["Implementation", implementation]);
  const language = join(info.language_info.name, info.language_info.version);
  if (language) rows.push(["Language", language]);
  if (info.protocol_version) rows.push(["Protocol", info.protocol_version]);
  if (info.language_info.file_extension) {
    rows.push(["File extension", info.language_info.file_extension]);
  }
  return rows;
};

export const formatKernelSpecs = (
  specs: KernelSpecMap,
  defaultKernelName: string
): string[] =>
  Object.values(specs)
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((spec) => {
      const marker = spec.name === defaultKernelName ? "*" : " ";
      const language = spec.language ? ` (${spec.language})` : "";
      return `${marker} ${spec.name}: ${spec.displayName}${language}`;
    });

const serverSettings = (options: ServerOptions) => ({
  jupyter: { baseUrl: options.url, token: options.token },
});

export const registerKernelCommands = (program: Command) => {
  program
    .command("kernels")
    .description("List the kernels a Jupyter server offers")
    .option("--url <url>", "Jupyter server URL")
    .option("--token <token>", "Jupyter server token")
    .action(async (options: ServerOptions) => {
      const { config } = await loadCliContext(serverSettings(options));
      const client = new JupyterServerClient(config.jupyter);
      const specs = await new JupyterKernelSpecSource(client).listSpecs();
      const lines = formatKernelSpecs(specs, config.defaultKernelName);
      if (lines.length === 0) {
        console.log(chalk.yellow("No kernels are available on this server."));
        return;
      }
      for (const line of lines) console.log(line);
    });

  program
    .command("kernel-info")
    .description("Connect to a kernel and print what it reports about itself")
    .option("--url <url>", "Jupyter server URL")
    .option("--token <token>", "Jupyter server token")
    .option("--kernel <name>", "Kernel to start")
    .option("--kernel-id <id>", "Attach to a running kernel instead of starting one")
    .action(async (options: InfoOptions) => {
      const { config, logger } = await loadCliContext({
        ...serverSettings(options),
        defaultKernelName: options.kernel,
      });
      const client = new JupyterServerClient(config.jupyter);
      const startedKernels: string[] = [];

      const session = new KernelSession({
        kernelName: config.defaultKernelName,
        startTimeoutMs: config.kernelStartTimeoutMs,
        statusTimeoutMs: config.kernelStatusTimeoutMs,
        logger,
        connect: createJupyterServerConnector({
          baseUrl: config.jupyter.baseUrl,
          token: config.jupyter.token,
          timeoutMs: config.kernelStartTimeoutMs,
          logger,
          resolveKernelId: async (kernelName) => {
            if (options.kernelId) return options.kernelId;
            const model = await client.startKernel(kernelName);
            startedKernels.push(model.id);
            return model.id;
          },
        }),
      });

      try {
        const outcome = await session.start({ wait: true });
        if (outcome.status !== "ok") {
          const reason =
            outcome.status === "error" ? outcome.error.message : "Kernel did not start";
          console.error(`${chalk.red("✖")} ${reason}`);
          process.exitCode = 1;
          return;
        }
        console.log(
          `${chalk.green("✔")} Connected to ${chalk.cyan(session.kernelId ?? session.kernelName)}`
        );
        for (const [label, value] of describeKernelInfo(outcome.info)) {
          console.log(`${chalk.dim(label)}: ${chalk.white(value)}`);
        }
        if (outcome.info.banner) {
          console.log(chalk.dim(outcome.info.banner));
        }
      } finally {
        session.dispose();
        for (const kernelId of startedKernels) {
          await client.shutdownKernel(kernelId).catch((err: unknown) => {
            logger.warn({ err, kernelId }, "Kernel shutdown failed");
          });
        }
      }
    });
};
