import type { AppConfig } from "@stagewatch/contracts";

export const DEFAULT_CONFIG: AppConfig = {
  tracing: {
    maxTraces: 10_000,
    enableMetadata: true,
    autoCreateOnUnknownCheckpoint: true,
    recordStartCheckpoint: false,
    lostEventTimeoutSeconds: 5,
  },
  sampler: {
    intervalMs: 1_000,
    queueCapacity: 1_000,
    historySize: 300,
    actionWindowMs: 60_000,
  },
  dashboard: {
    host: "127.0.0.1",
    port: 8765,
    broadcastIntervalMs: 1_000,
  },
  logging: {
    level: "info",
    pretty: false,
  },
};
