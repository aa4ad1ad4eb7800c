import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { mergeConfig, silentLogger } from "@stagewatch/core";
import { createServer, type DashboardServer } from "./app.js";

const servers: DashboardServer[] = [];

afterEach(async () => {
  for (const server of servers.splice(0)) await server.stop();
});

describe("createServer", () => {
  it("wires dashboard settings from config", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "stagewatch-server-"));
    const config = mergeConfig({
      dashboard: { host: "127.0.0.1", port: 0, broadcastIntervalMs: 250 },
      sampler: { intervalMs: 60_000 },
    });
    const server = await createServer({ config, logger: silentLogger(), staticRoot: root });
    servers.push(server);

    expect(server.host).toBe("127.0.0.1");
    expect(server.port).toBe(0);
    expect(server.broadcastIntervalMs).toBe(250);

    const response = await server.app.inject({ method: "GET", url: "/api/healthz" });
    expect(response.json()).toEqual({ ok: true, clients: 0 });
  });

  it("listens on an ephemeral port and reports its url", async () => {
    const config = mergeConfig({ dashboard: { port: 0 }, sampler: { intervalMs: 60_000 } });
    const server = await createServer({ config, logger: silentLogger() });
    servers.push(server);

    await server.start();
    expect(server.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

    const response = await server.app.inject({ method: "GET", url: "/api/metrics" });
    expect(response.statusCode).toBe(200);
    expect(Object.keys(response.json())).toEqual(["system", "actions", "events"]);
  });
});
