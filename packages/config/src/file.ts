import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import * as TOML from "@iarna/toml";
import { z } from "zod";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const JupyterSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    token: z.string().min(1).optional(),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    defaultKernelName: z.string().min(1).optional(),
    kernelStartTimeoutMs: z.coerce.number().int().positive().optional(),
    kernelStatusTimeoutMs: z.coerce.number().int().positive().optional(),
    debug: z.boolean().optional(),
    logLevel: LogLevelSchema.optional(),
    logFile: z.string().min(1).optional(),
    logQueueCapacity: z.coerce.number().int().positive().optional(),
    jupyter: JupyterSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const getConfigDir = (): string => {
  if (process.platform === "win32") {
    const appData = process.env.APPDATA;
    if (appData && appData.length > 0) {
      return path.join(appData, "cellterm");
    }
    return path.join(os.homedir(), "AppData", "Roaming", "cellterm");
  }
  const xdg = process.env.XDG_CONFIG_HOME;
  const baseDir =
    xdg && xdg.length > 0
      ? path.resolve(xdg)
      : path.join(os.homedir(), ".config");
  return path.join(baseDir, "cellterm");
};

export const getConfigFilePath = (): string => {
  return path.join(getConfigDir(), "cellterm.toml");
};

/** Reads the config file; a missing file yields `null`. */
export const loadConfigFile = async (
  file: string = getConfigFilePath()
): Promise<ConfigFile | null> => {
  try {
    const raw = await fs.readFile(file, "utf8");
    return ConfigFileSchema.parse(TOML.parse(raw));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
};

const serialize = (config: ConfigFile): TOML.JsonMap => {
  const payload: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(config)) {
    if (value === undefined || typeof value === "object") continue;
    payload[key] = value;
  }
  if (config.jupyter) {
    const jupyter: TOML.JsonMap = {};
    if (config.jupyter.baseUrl) jupyter.baseUrl = config.jupyter.baseUrl;
    if (config.jupyter.token) jupyter.token = config.jupyter.token;
    if (Object.keys(jupyter).length > 0) payload.jupyter = jupyter;
  }
  return payload;
};

export const saveConfigFile = async (
  config: ConfigFile,
  file: string = getConfigFilePath()
): Promise<ConfigFile> => {
  const parsed = ConfigFileSchema.parse(config);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `${TOML.stringify(serialize(parsed))}\n`, {
    encoding: "utf8",
    mode: 0o600,
  });
  return parsed;
};
