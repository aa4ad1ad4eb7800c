import { EventEmitter } from "node:events";
import type {
  ActionMetrics,
  ActionRecord,
  EventMetrics,
  MetricsSnapshot,
  SamplerConfig,
  SystemMetrics,
} from "@stagewatch/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asErrorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { NodeResourceProbe, type ResourceProbe } from "./resourceProbe.js";
import { RingBuffer } from "./ringBuffer.js";
import { mean, systemClock, type Clock } from "./utils.js";

const BYTES_PER_MB = 1024 * 1024;
const MS_PER_MINUTE = 60_000;

export interface MetricsSamplerOptions extends Partial<SamplerConfig> {
  probe?: ResourceProbe;
  clock?: Clock;
  logger?: Logger;
}

export class ActionRecorder {
  private readonly history: RingBuffer<ActionRecord>;
  private currentAction: string | null = null;
  private queueDepth = 0;

  constructor(historySize: number) {
    this.history = new RingBuffer<ActionRecord>(historySize);
  }

  record(record: ActionRecord): void {
    this.history.push(record);
  }

  setCurrentAction(name: string | null): void {
    this.currentAction = name;
  }

  setQueueDepth(depth: number): void {
    this.queueDepth = Math.max(0, Math.floor(depth));
  }

  snapshot(now: number, windowMs: number): ActionMetrics {
    const records = this.history.toArray();
    const windowStart = now - windowMs / 1000;
    const recent = records.filter((record) => record.timestamp >= windowStart);
    const successes = recent.filter((record) => record.success).length;

    return {
      timestamp: now,
      total_actions: records.length,
      actions_per_minute: recent.length * (MS_PER_MINUTE / windowMs),
      avg_duration: mean(recent.map((record) => record.duration)),
      current_action: this.currentAction,
      queue_depth: this.queueDepth,
      success_rate: recent.length > 0 ? (successes / recent.length) * 100 : 100,
      error_count: records.filter((record) => !record.success).length,
    };
  }
}

export class EventRecorder {
  private queued = 0;
  private processed = 0;
  private failed = 0;
  private queueDepth = 0;
  private readonly durations: RingBuffer<number>;

  constructor(historySize: number) {
    this.durations = new RingBuffer<number>(historySize);
  }

  record(processingTime: number, success: boolean): void {
    this.queued += 1;
    if (success) {
      this.processed += 1;
      this.durations.push(processingTime);
    } else {
      this.failed += 1;
    }
  }

  setQueueDepth(depth: number): void {
    this.queueDepth = Math.max(0, Math.floor(depth));
  }

  snapshot(now: number): EventMetrics {
    return {
      timestamp: now,
      events_queued: this.queued,
      events_processed: this.processed,
      events_failed: this.failed,
      avg_processing_time: mean(this.durations.toArray()),
      queue_depth: this.queueDepth,
    };
  }
}

/**
 * Samples process resources and producer-reported action/event activity.
 *
 * While started, each tick refreshes the resource readings asynchronously,
 * then publishes a snapshot every `intervalMs` into a bounded hand-off queue
 * (oldest dropped when full) and emits it as `sample`. `getLatestMetrics`
 * never probes; it stamps the cached readings with the current time.
 */
export class MetricsSampler extends EventEmitter {
  readonly intervalMs: number;
  private readonly actionWindowMs: number;
  private readonly probe: ResourceProbe;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly actions: ActionRecorder;
  private readonly events: EventRecorder;
  private readonly queue: RingBuffer<MetricsSnapshot>;
  private readonly waiters = new Set<() => void>();
  private lastSystem: Omit<SystemMetrics, "timestamp"> = {
    cpu_percent: 0,
    memory_mb: 0,
    memory_percent: 0,
    thread_count: 0,
    process_count: 1,
  };
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private generation = 0;
  private dropped = 0;

  constructor(options: MetricsSamplerOptions = {}) {
    super();
    const defaults = DEFAULT_CONFIG.sampler;
    const historySize = Math.max(1, Math.floor(options.historySize ?? defaults.historySize));
    this.intervalMs = Math.max(1, options.intervalMs ?? defaults.intervalMs);
    this.actionWindowMs = Math.max(1, options.actionWindowMs ?? defaults.actionWindowMs);
    this.probe = options.probe ?? new NodeResourceProbe();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
    this.actions = new ActionRecorder(historySize);
    this.events = new EventRecorder(historySize);
    this.queue = new RingBuffer<MetricsSnapshot>(
      Math.max(1, Math.floor(options.queueCapacity ?? defaults.queueCapacity)),
    );
  }

  static fromConfig(
    config: SamplerConfig,
    extra: { probe?: ResourceProbe; clock?: Clock; logger?: Logger } = {},
  ): MetricsSampler {
    return new MetricsSampler({ ...config, ...extra });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  recordAction(name: string, duration: number, success = true): void {
    this.actions.record({ timestamp: this.clock(), name, duration, success });
  }

  setCurrentAction(name: string | null): void {
    this.actions.setCurrentAction(name);
  }

  setActionQueueDepth(depth: number): void {
    this.actions.setQueueDepth(depth);
  }

  recordEvent(processingTime: number, success = true): void {
    this.events.record(processingTime, success);
  }

  setEventQueueDepth(depth: number): void {
    this.events.setQueueDepth(depth);
  }

  getLatestMetrics(): MetricsSnapshot {
    const now = this.clock();
    return {
      system: { timestamp: now, ...this.lastSystem },
      actions: this.actions.snapshot(now, this.actionWindowMs),
      events: this.events.snapshot(now),
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation += 1;
    this.logger.debug({ intervalMs: this.intervalMs }, "metrics sampler started");
    void this.tick(this.generation);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.debug({ dropped: this.dropped }, "metrics sampler stopped");
  }

  pollMetrics(): MetricsSnapshot | undefined {
    return this.queue.shift();
  }

  /** Next queued snapshot, waiting up to `timeoutMs` for one; null on timeout. */
  nextMetrics(timeoutMs = 100): Promise<MetricsSnapshot | null> {
    const ready = this.queue.shift();
    if (ready) return Promise.resolve(ready);

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const onPublish = (): void => {
        const next = this.queue.shift();
        if (!next) return;
        clearTimeout(timer);
        this.waiters.delete(onPublish);
        resolve(next);
      };
      timer = setTimeout(() => {
        this.waiters.delete(onPublish);
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.waiters.add(onPublish);
    });
  }

  drainMetrics(): MetricsSnapshot[] {
    const drained = this.queue.toArray();
    this.queue.clear();
    return drained;
  }

  /** Takes one snapshot and hands it to queue consumers and `sample` listeners. */
  publish(): MetricsSnapshot {
    const snapshot = this.getLatestMetrics();
    if (this.queue.push(snapshot) !== undefined) {
      this.dropped += 1;
    }
    for (const waiter of [...this.waiters]) waiter();
    this.emit("sample", snapshot);
    return snapshot;
  }

  /** Refreshes the cached resource readings; a failed probe keeps its last value. */
  async sampleResources(): Promise<SystemMetrics> {
    const last = this.lastSystem;
    const [threadCount, processCount] = await Promise.all([
      this.read("threads", () => this.probe.threadCount(), last.thread_count),
      this.read("processes", () => this.probe.processCount(), last.process_count),
    ]);
    const next = {
      cpu_percent: await this.read("cpu", () => this.probe.cpuPercent(), last.cpu_percent),
      memory_mb: await this.read("rss", () => Math.floor(this.probe.rssBytes() / BYTES_PER_MB), last.memory_mb),
      memory_percent: await this.read("memory", () => this.probe.memoryPercent(), last.memory_percent),
      thread_count: threadCount,
      process_count: processCount,
    };
    this.lastSystem = next;
    return { timestamp: this.clock(), ...next };
  }

  private async tick(generation: number): Promise<void> {
    try {
      await this.sampleResources();
      if (generation !== this.generation || !this.running) return;
      this.publish();
    } catch (error) {
      this.logger.warn({ err: asErrorMessage(error) }, "metrics sample failed");
    }
    if (generation !== this.generation || !this.running) return;
    this.timer = setTimeout(() => void this.tick(generation), this.intervalMs);
  }

  private async read(probeName: string, sample: () => number | Promise<number>, fallback: number): Promise<number> {
    try {
      const value = await sample();
      return Number.isFinite(value) ? value : fallback;
    } catch (error) {
      this.logger.debug({ probe: probeName, err: asErrorMessage(error) }, "resource probe failed");
      return fallback;
    }
  }
}
