export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface EditorConfig {
  /** Kernel used when a notebook's metadata names none. */
  defaultKernelName: string;
  kernelStartTimeoutMs: number;
  kernelStatusTimeoutMs: number;
  debug: boolean;
  logLevel: LogLevel;
  /** Extra log destination; "-" means stdout. */
  logFile?: string;
  logQueueCapacity: number;
  jupyter: JupyterServerConfig;
}

export interface JupyterServerConfig {
  baseUrl: string;
  token?: string;
}

export type EditorSettings = Partial<
  Omit<EditorConfig, "jupyter"> & { jupyter: Partial<JupyterServerConfig> }
>;
