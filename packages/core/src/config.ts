import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  DashboardConfig,
  LoggingConfig,
  LogLevel,
  SamplerConfig,
  TracingConfig,
} from "@stagewatch/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asRecord, expandHome } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".stagewatch", "config.toml");

type LooseSection<T> = { [K in keyof T]?: unknown };

export interface PartialAppConfigInput {
  tracing?: LooseSection<TracingConfig>;
  sampler?: LooseSection<SamplerConfig>;
  dashboard?: LooseSection<DashboardConfig>;
  logging?: LooseSection<LoggingConfig>;
}

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function positiveMsOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

function positiveOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return numeric;
}

function booleanOrDefault(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function mergeTracing(input?: LooseSection<TracingConfig>): TracingConfig {
  const defaults = DEFAULT_CONFIG.tracing;
  return {
    maxTraces: positiveIntOrDefault(input?.maxTraces, defaults.maxTraces),
    enableMetadata: booleanOrDefault(input?.enableMetadata, defaults.enableMetadata),
    autoCreateOnUnknownCheckpoint: booleanOrDefault(
      input?.autoCreateOnUnknownCheckpoint,
      defaults.autoCreateOnUnknownCheckpoint,
    ),
    recordStartCheckpoint: booleanOrDefault(input?.recordStartCheckpoint, defaults.recordStartCheckpoint),
    lostEventTimeoutSeconds: positiveOrDefault(input?.lostEventTimeoutSeconds, defaults.lostEventTimeoutSeconds),
  };
}

function mergeSampler(input?: LooseSection<SamplerConfig>): SamplerConfig {
  const defaults = DEFAULT_CONFIG.sampler;
  return {
    intervalMs: positiveMsOrDefault(input?.intervalMs, defaults.intervalMs),
    queueCapacity: positiveIntOrDefault(input?.queueCapacity, defaults.queueCapacity),
    historySize: positiveIntOrDefault(input?.historySize, defaults.historySize),
    actionWindowMs: positiveMsOrDefault(input?.actionWindowMs, defaults.actionWindowMs),
  };
}

function mergeDashboard(input?: LooseSection<DashboardConfig>): DashboardConfig {
  const defaults = DEFAULT_CONFIG.dashboard;
  const host = typeof input?.host === "string" && input.host.trim() ? input.host.trim() : defaults.host;
  const port = toFiniteNumber(input?.port);
  return {
    host,
    // 0 asks the OS for a free port.
    port: port !== null && port >= 0 && port <= 65_535 ? Math.round(port) : defaults.port,
    broadcastIntervalMs: positiveMsOrDefault(input?.broadcastIntervalMs, defaults.broadcastIntervalMs),
  };
}

function mergeLogging(input?: LooseSection<LoggingConfig>): LoggingConfig {
  const defaults = DEFAULT_CONFIG.logging;
  const level = typeof input?.level === "string" ? input.level.trim().toLowerCase() : "";
  return {
    level: isLogLevel(level) ? level : defaults.level,
    pretty: booleanOrDefault(input?.pretty, defaults.pretty),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    tracing: mergeTracing(input?.tracing),
    sampler: mergeSampler(input?.sampler),
    dashboard: mergeDashboard(input?.dashboard),
    logging: mergeLogging(input?.logging),
  };
}

function toPartialInput(parsed: Record<string, unknown>): PartialAppConfigInput {
  return {
    tracing: asRecord(parsed.tracing),
    sampler: asRecord(parsed.sampler),
    dashboard: asRecord(parsed.dashboard),
    logging: asRecord(parsed.logging),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(expandHome(configPath), "utf8");
    return mergeConfig(toPartialInput(TOML.parse(raw)));
  } catch {
    return mergeConfig();
  }
}

function toJsonMap(config: AppConfig): JsonMap {
  return {
    tracing: { ...config.tracing },
    sampler: { ...config.sampler },
    dashboard: { ...config.dashboard },
    logging: { ...config.logging },
  };
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const target = expandHome(configPath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, TOML.stringify(toJsonMap(config)), "utf8");
}
