import type { AppConfig } from "@stagewatch/contracts";
import { createLogger, DEFAULT_CONFIG_PATH, loadConfig, MetricsSampler, type Logger } from "@stagewatch/core";
import { DashboardServer, type DashboardServerOptions } from "./dashboard.js";

export * from "./dashboard.js";

export interface CreateServerOptions {
  config: AppConfig;
  logger?: Logger;
  sampler?: MetricsSampler;
  staticRoot?: string;
}

export async function createServer(options: CreateServerOptions): Promise<DashboardServer> {
  const { config } = options;
  const logger = options.logger ?? createLogger(config.logging);
  const sampler =
    options.sampler ?? MetricsSampler.fromConfig(config.sampler, { logger: logger.child({ component: "sampler" }) });

  const dashboardOptions: DashboardServerOptions = {
    sampler,
    host: config.dashboard.host,
    port: config.dashboard.port,
    broadcastIntervalMs: config.dashboard.broadcastIntervalMs,
    logger: logger.child({ component: "dashboard" }),
  };
  if (options.staticRoot !== undefined) {
    dashboardOptions.staticRoot = options.staticRoot;
  }
  return DashboardServer.create(dashboardOptions);
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  broadcastIntervalMs?: number;
  configPath?: string;
}

function portFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const port = Number(value);
  return Number.isInteger(port) && port >= 0 && port <= 65_535 ? port : undefined;
}

/** Loads config, starts the dashboard and stops it cleanly on SIGINT or SIGTERM. */
export async function runServer(options: RunServerOptions = {}): Promise<DashboardServer> {
  const configPath = options.configPath ?? process.env.STAGEWATCH_CONFIG ?? DEFAULT_CONFIG_PATH;
  const loaded = await loadConfig(configPath);
  const config: AppConfig = {
    ...loaded,
    dashboard: {
      host: options.host ?? process.env.STAGEWATCH_HOST ?? loaded.dashboard.host,
      port: options.port ?? portFromEnv(process.env.STAGEWATCH_PORT) ?? loaded.dashboard.port,
      broadcastIntervalMs: options.broadcastIntervalMs ?? loaded.dashboard.broadcastIntervalMs,
    },
  };

  const logger = createLogger(config.logging);
  const dashboard = await createServer({ config, logger });
  await dashboard.start();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "shutting down");
    dashboard
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return dashboard;
}
