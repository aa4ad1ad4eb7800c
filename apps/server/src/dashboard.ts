import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyWebsocket from "@fastify/websocket";
import { WebSocket, type RawData } from "ws";
import type { ClientMessage, MetricsSnapshot, PongMessage } from "@stagewatch/contracts";
import {
  asErrorMessage,
  asFiniteNumber,
  asRecord,
  DEFAULT_CONFIG,
  silentLogger,
  type Logger,
  type MetricsSampler,
} from "@stagewatch/core";

const CLOSE_GOING_AWAY = 1001;
const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

export interface DashboardServerOptions {
  sampler: MetricsSampler;
  host?: string;
  port?: number;
  broadcastIntervalMs?: number;
  /** A client with more unsent bytes than this is treated as stalled and dropped. */
  maxBufferedBytes?: number;
  logger?: Logger;
  /** Directory holding index.html; an inline page is served when it is missing. */
  staticRoot?: string;
}

export function defaultStaticRoot(): string {
  return fileURLToPath(new URL("../public", import.meta.url));
}

export function parseClientMessage(value: unknown): ClientMessage | null {
  const record = asRecord(value);
  if (record.type === "ping") {
    return { type: "ping", timestamp: asFiniteNumber(record.timestamp) };
  }
  if (record.type === "request_metrics") {
    return { type: "request_metrics" };
  }
  return null;
}

function rawToText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

function fallbackPage(): string {
  return `<!doctype html>
<html><body style="font-family: sans-serif; padding: 2rem;">
<h1>stagewatch dashboard running</h1>
<p>Dashboard page not found.</p>
<p>Live metrics: <code>/ws</code> (WebSocket), <a href="/api/metrics">/api/metrics</a></p>
</body></html>`;
}

/**
 * Streams metrics snapshots to every connected WebSocket client.
 *
 * One snapshot is taken per broadcast tick and queued to every client without
 * waiting for delivery. A client that is closed, fails a send, or holds more
 * than `maxBufferedBytes` unsent is dropped without affecting the rest.
 */
export class DashboardServer {
  readonly app: FastifyInstance;
  readonly host: string;
  readonly port: number;
  readonly broadcastIntervalMs: number;
  readonly maxBufferedBytes: number;
  private readonly sampler: MetricsSampler;
  private readonly logger: Logger;
  private readonly clients = new Set<WebSocket>();
  private broadcastTimer: NodeJS.Timeout | null = null;
  private started = false;
  private stopped = false;
  private listeningUrl: string | null = null;

  private constructor(app: FastifyInstance, options: DashboardServerOptions) {
    const defaults = DEFAULT_CONFIG.dashboard;
    this.app = app;
    this.sampler = options.sampler;
    this.host = options.host ?? defaults.host;
    this.port = options.port ?? defaults.port;
    this.broadcastIntervalMs = Math.max(1, options.broadcastIntervalMs ?? defaults.broadcastIntervalMs);
    this.maxBufferedBytes = Math.max(0, options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES);
    this.logger = options.logger ?? silentLogger();
  }

  static async create(options: DashboardServerOptions): Promise<DashboardServer> {
    const app = Fastify({ logger: false });
    const dashboard = new DashboardServer(app, options);
    await dashboard.registerRoutes(options.staticRoot ?? defaultStaticRoot());
    return dashboard;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Address the server listens on once started. */
  get url(): string | null {
    return this.listeningUrl;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.sampler.start();
    this.startBroadcastLoop();
    try {
      this.listeningUrl = await this.app.listen({ host: this.host, port: this.port });
    } catch (error) {
      this.stopBroadcastLoop();
      this.sampler.stop();
      this.started = false;
      this.logger.error({ err: asErrorMessage(error), host: this.host, port: this.port }, "dashboard failed to listen");
      throw error;
    }
    this.logger.info({ url: this.listeningUrl }, "dashboard listening");
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.stopBroadcastLoop();
    for (const socket of this.clients) {
      socket.close(CLOSE_GOING_AWAY, "server shutting down");
    }
    this.clients.clear();
    this.sampler.stop();
    await this.app.close();
    this.logger.info("dashboard stopped");
  }

  /**
   * One broadcast tick: a single snapshot queued to every registered client.
   * Sends are not awaited; returns how many clients it was queued to.
   */
  broadcastOnce(): number {
    if (this.clients.size === 0) return 0;
    const payload = JSON.stringify(this.sampler.getLatestMetrics());
    let queued = 0;
    for (const socket of [...this.clients]) {
      if (this.sendTo(socket, payload)) queued += 1;
    }
    return queued;
  }

  private startBroadcastLoop(): void {
    this.stopBroadcastLoop();
    this.broadcastTimer = setInterval(() => {
      try {
        this.broadcastOnce();
      } catch (error) {
        this.logger.error({ err: asErrorMessage(error) }, "broadcast failed");
      }
    }, this.broadcastIntervalMs);
  }

  private stopBroadcastLoop(): void {
    if (this.broadcastTimer) {
      clearInterval(this.broadcastTimer);
      this.broadcastTimer = null;
    }
  }

  private sendTo(socket: WebSocket, payload: string): boolean {
    if (socket.readyState !== WebSocket.OPEN) {
      this.dropClient(socket, "socket not open");
      return false;
    }
    if (socket.bufferedAmount > this.maxBufferedBytes) {
      this.dropClient(socket, `client stalled with ${socket.bufferedAmount} bytes unsent`);
      return false;
    }
    try {
      socket.send(payload, (error) => {
        if (error) this.dropClient(socket, asErrorMessage(error));
      });
      return true;
    } catch (error) {
      this.dropClient(socket, asErrorMessage(error));
      return false;
    }
  }

  private sendSnapshot(socket: WebSocket, snapshot: MetricsSnapshot = this.sampler.getLatestMetrics()): void {
    this.sendTo(socket, JSON.stringify(snapshot));
  }

  private dropClient(socket: WebSocket, reason: string): void {
    if (!this.clients.delete(socket)) return;
    this.logger.warn({ reason, clients: this.clients.size }, "dropping dashboard client");
    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    }
  }

  private handleMessage(socket: WebSocket, raw: RawData): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawToText(raw));
    } catch (error) {
      this.logger.warn({ err: asErrorMessage(error) }, "ignoring malformed client message");
      return;
    }

    const message = parseClientMessage(parsed);
    if (!message) return;
    if (message.type === "ping") {
      const pong: PongMessage = { type: "pong", timestamp: message.timestamp };
      this.sendTo(socket, JSON.stringify(pong));
      return;
    }
    this.sendSnapshot(socket);
  }

  private handleConnection(socket: WebSocket): void {
    this.clients.add(socket);
    this.logger.info({ clients: this.clients.size }, "dashboard client connected");

    socket.on("message", (raw: RawData) => this.handleMessage(socket, raw));
    socket.on("close", () => {
      if (this.clients.delete(socket)) {
        this.logger.info({ clients: this.clients.size }, "dashboard client disconnected");
      }
    });
    socket.on("error", (error: Error) => {
      this.logger.error({ err: error.message }, "dashboard client error");
      this.dropClient(socket, error.message);
    });

    this.sendSnapshot(socket);
  }

  private async registerRoutes(staticRoot: string): Promise<void> {
    const server = this.app;
    const hasStatic = existsSync(path.join(staticRoot, "index.html"));

    await server.register(fastifyWebsocket);
    if (hasStatic) {
      await server.register(fastifyStatic, {
        root: staticRoot,
        prefix: "/",
      });
    }

    server.get("/api/healthz", async () => ({ ok: true, clients: this.clients.size }));

    server.get("/api/metrics", async () => this.sampler.getLatestMetrics());

    server.get("/ws", { websocket: true }, (socket) => {
      this.handleConnection(socket);
    });

    server.get("/", async (_request, reply) => {
      if (!hasStatic) {
        reply.type("text/html");
        return fallbackPage();
      }
      return reply.sendFile("index.html");
    });
  }
}
