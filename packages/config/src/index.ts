import { LogLevelSchema } from "./file.js";
import type {
  EditorConfig,
  EditorSettings,
  JupyterServerConfig,
  LogLevel,
} from "./types.js";

export const DEFAULT_KERNEL_NAME = "python3";
export const DEFAULT_JUPYTER_URL = "http://127.0.0.1:8888";

const bool = (v: string | undefined, fallback: boolean): boolean => {
  if (v == null) return fallback;
  const s = v.toLowerCase().trim();
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return fallback;
};

const num = (v: string | undefined): number | undefined => {
  if (v == null) return undefined;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};

const sanitizeTimeout = (value: unknown): number | undefined => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return undefined;
  }
  return Math.min(Math.max(Math.trunc(value), 1_000), 600_000);
};

const sanitizeCapacity = (value: unknown): number | undefined => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return undefined;
  }
  const n = Math.trunc(value);
  return n >= 1 ? Math.min(n, 100_000) : undefined;
};

const sanitizeString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const parseLogLevel = (value: unknown): LogLevel | undefined => {
  const parsed = LogLevelSchema.safeParse(
    typeof value === "string" ? value.trim().toLowerCase() : value
  );
  return parsed.success ? parsed.data : undefined;
};

/**
 * Resolves the editor configuration. Explicit settings (usually read from
 * the config file) win over `CELLTERM_*` environment variables, which win
 * over defaults.
 */
export function loadEditorConfig(
  env: NodeJS.ProcessEnv | undefined = process.env,
  overrides: EditorSettings = {}
): EditorConfig {
  const resolvedEnv = env ?? process.env;

  const debug =
    typeof overrides.debug === "boolean"
      ? overrides.debug
      : bool(resolvedEnv.CELLTERM_DEBUG, false);

  const defaultKernelName =
    sanitizeString(overrides.defaultKernelName) ??
    sanitizeString(resolvedEnv.CELLTERM_DEFAULT_KERNEL) ??
    DEFAULT_KERNEL_NAME;

  const kernelStartTimeoutMs =
    sanitizeTimeout(overrides.kernelStartTimeoutMs) ??
    sanitizeTimeout(num(resolvedEnv.CELLTERM_KERNEL_START_TIMEOUT_MS)) ??
    60_000;

  const kernelStatusTimeoutMs =
    sanitizeTimeout(overrides.kernelStatusTimeoutMs) ??
    sanitizeTimeout(num(resolvedEnv.CELLTERM_KERNEL_STATUS_TIMEOUT_MS)) ??
    30_000;

  const logLevel =
    parseLogLevel(overrides.logLevel) ??
    parseLogLevel(resolvedEnv.CELLTERM_LOG_LEVEL) ??
    (debug ? "debug" : "info");

  const logFile =
    sanitizeString(overrides.logFile) ??
    sanitizeString(resolvedEnv.CELLTERM_LOG_FILE);

  const logQueueCapacity =
    sanitizeCapacity(overrides.logQueueCapacity) ??
    sanitizeCapacity(num(resolvedEnv.CELLTERM_LOG_QUEUE_CAPACITY)) ??
    1_000;

  const jupyter: JupyterServerConfig = {
    baseUrl:
      sanitizeString(overrides.jupyter?.baseUrl) ??
      sanitizeString(resolvedEnv.CELLTERM_JUPYTER_URL) ??
      DEFAULT_JUPYTER_URL,
    token:
      sanitizeString(overrides.jupyter?.token) ??
      sanitizeString(resolvedEnv.CELLTERM_JUPYTER_TOKEN) ??
      sanitizeString(resolvedEnv.JUPYTER_TOKEN),
  };

  return {
    defaultKernelName,
    kernelStartTimeoutMs,
    kernelStatusTimeoutMs,
    debug,
    logLevel,
    logFile,
    logQueueCapacity,
    jupyter,
  } satisfies EditorConfig;
}

export {
  ConfigFileSchema,
  LogLevelSchema,
  getConfigDir,
  getConfigFilePath,
  loadConfigFile,
  saveConfigFile,
  type ConfigFile,
} from "./file.js";

export type { EditorConfig, EditorSettings, JupyterServerConfig, LogLevel };
