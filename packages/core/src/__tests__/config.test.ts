import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, mergeConfig, saveConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../defaults.js";
import { expandHome } from "../utils.js";

async function createTempRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "stagewatch-config-"));
}

describe("config", () => {
  it("provides defaults for tracing, sampling, dashboard, and logging", () => {
    const config = mergeConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.tracing.maxTraces).toBe(10_000);
    expect(config.tracing.autoCreateOnUnknownCheckpoint).toBe(true);
    expect(config.sampler.queueCapacity).toBe(1_000);
    expect(config.dashboard.port).toBe(8765);
    expect(config.logging.level).toBe("info");
  });

  it("normalizes out-of-range and mistyped values back to defaults", () => {
    const config = mergeConfig({
      tracing: { maxTraces: -5, enableMetadata: "yes", lostEventTimeoutSeconds: 0 },
      sampler: { intervalMs: 250.6, queueCapacity: Number.NaN },
      dashboard: { host: "  ", port: 70_000, broadcastIntervalMs: 500 },
      logging: { level: "LOUD", pretty: true },
    });
    expect(config.tracing.maxTraces).toBe(10_000);
    expect(config.tracing.enableMetadata).toBe(true);
    expect(config.tracing.lostEventTimeoutSeconds).toBe(5);
    expect(config.sampler.intervalMs).toBe(251);
    expect(config.sampler.queueCapacity).toBe(1_000);
    expect(config.dashboard.host).toBe("127.0.0.1");
    expect(config.dashboard.port).toBe(8765);
    expect(config.dashboard.broadcastIntervalMs).toBe(500);
    expect(config.logging).toEqual({ level: "info", pretty: true });
  });

  it("accepts port 0 and case-insensitive log levels", () => {
    const config = mergeConfig({ dashboard: { port: 0 }, logging: { level: " Debug " } });
    expect(config.dashboard.port).toBe(0);
    expect(config.logging.level).toBe("debug");
  });

  it("loads nested sections from TOML", async () => {
    const root = await createTempRoot();
    const configPath = path.join(root, "config.toml");
    await writeFile(
      configPath,
      [
        "[tracing]",
        "maxTraces = 50",
        "autoCreateOnUnknownCheckpoint = false",
        "",
        "[dashboard]",
        'host = "0.0.0.0"',
        "port = 9000",
        "",
      ].join("\n"),
      "utf8",
    );

    const config = await loadConfig(configPath);
    expect(config.tracing.maxTraces).toBe(50);
    expect(config.tracing.autoCreateOnUnknownCheckpoint).toBe(false);
    expect(config.dashboard.host).toBe("0.0.0.0");
    expect(config.dashboard.port).toBe(9000);
    expect(config.sampler).toEqual(DEFAULT_CONFIG.sampler);
  });

  it("falls back to defaults for missing or unparsable files", async () => {
    const root = await createTempRoot();
    expect(await loadConfig(path.join(root, "missing.toml"))).toEqual(DEFAULT_CONFIG);

    const brokenPath = path.join(root, "broken.toml");
    await writeFile(brokenPath, "[tracing\nmaxTraces = ", "utf8");
    expect(await loadConfig(brokenPath)).toEqual(DEFAULT_CONFIG);
  });

  it("round-trips through saveConfig", async () => {
    const root = await createTempRoot();
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({ sampler: { historySize: 42 }, logging: { level: "warn" } });

    await saveConfig(config, configPath);
    const written = await readFile(configPath, "utf8");
    expect(written).toContain("[sampler]");
    expect(await loadConfig(configPath)).toEqual(config);
  });

  it("expands a leading tilde to the home directory", () => {
    expect(expandHome("~")).toBe(os.homedir());
    expect(expandHome("~/.stagewatch/config.toml")).toBe(path.join(os.homedir(), ".stagewatch/config.toml"));
    expect(expandHome("/etc/stagewatch.toml")).toBe("/etc/stagewatch.toml");
  });
});
