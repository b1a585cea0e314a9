import type { Logger } from "pino";
import {
  getConfigFilePath,
  loadConfigFile,
  loadEditorConfig,
  type EditorConfig,
  type EditorSettings,
} from "@cellterm/config";
import { LogQueue, configureLogging, createLogger } from "@cellterm/log-queue";

export interface CliContext {
  config: EditorConfig;
  configFile: string;
  queue: LogQueue;
  logger: Logger;
}

/**
 * Resolves configuration (flags over config file over environment) and
 * sets up logging for one CLI invocation.
 */
export const loadCliContext = async (
  overrides: EditorSettings = {},
  configFile: string = getConfigFilePath()
): Promise<CliContext> => {
  const fileSettings = (await loadConfigFile(configFile)) ?? {};
  const config = loadEditorConfig(process.env, {
    ...fileSettings,
    ...definedEntries(overrides),
    jupyter: {
      ...fileSettings.jupyter,
      ...definedEntries(overrides.jupyter ?? {}),
    },
  });
  const queue = new LogQueue(config.logQueueCapacity);
  configureLogging({ level: config.logLevel, logFile: config.logFile, queue });
  return { config, configFile, queue, logger: createLogger("cli") };
};

const definedEntries = <T extends object>(value: T): Partial<T> => {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (!isKeyOf(value, key)) continue;
    const entry = value[key];
    if (entry !== undefined) result[key] = entry;
  }
  return result;
};

const isKeyOf = <T extends object>(value: T, key: PropertyKey): key is keyof T =>
  key in value;
