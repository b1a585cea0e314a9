import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  getConfigFilePath,
  loadConfigFile,
  saveConfigFile,
} from "../src/file.js";

const originalXdg = process.env.XDG_CONFIG_HOME;
const tempDirs = new Set<string>();

const makeTempDir = async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "cellterm-config-"));
  tempDirs.add(dir);
  return dir;
};

const restoreXdg = () => {
  if (originalXdg === undefined) {
    delete process.env.XDG_CONFIG_HOME;
  } else {
    process.env.XDG_CONFIG_HOME = originalXdg;
  }
};

describe("config file helpers", () => {
  beforeEach(() => {
    restoreXdg();
  });

  afterEach(async () => {
    for (const dir of tempDirs) {
      await fs.rm(dir, { recursive: true, force: true });
    }
    tempDirs.clear();
    restoreXdg();
  });

  it("places the config file under XDG_CONFIG_HOME", async () => {
    if (process.platform === "win32") return;
    const dir = await makeTempDir();
    process.env.XDG_CONFIG_HOME = dir;
    expect(getConfigFilePath()).toBe(path.join(dir, "cellterm", "cellterm.toml"));
  });

  it("returns null when no config file exists", async () => {
    const dir = await makeTempDir();
    await expect(loadConfigFile(path.join(dir, "missing.toml"))).resolves.toBeNull();
  });

  it("saves and reloads settings as TOML", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "nested", "cellterm.toml");
    await saveConfigFile(
      {
        defaultKernelName: "ir",
        kernelStartTimeoutMs: 20_000,
        debug: true,
        logLevel: "debug",
        jupyter: { baseUrl: "http://localhost:9999", token: "test-secret" },
      },
      file
    );
    const raw = await fs.readFile(file, "utf8");
    expect(raw).toContain('defaultKernelName = "ir"');
    expect(raw).toContain("[jupyter]");

    const loaded = await loadConfigFile(file);
    expect(loaded).toEqual({
      defaultKernelName: "ir",
      kernelStartTimeoutMs: 20_000,
      debug: true,
      logLevel: "debug",
      jupyter: { baseUrl: "http://localhost:9999", token: "test-secret" },
    });
  });

  it("rejects unknown keys", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "cellterm.toml");
    await fs.writeFile(file, 'theme = "dark"\n', "utf8");
    await expect(loadConfigFile(file)).rejects.toThrow();
  });
});
