import { EventEmitter } from "node:events";
import { threadId } from "node:worker_threads";
import type { EventFlow, EventTrace, TraceStoreStatistics, TracingConfig } from "@stagewatch/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { TraceNotFoundError } from "./errors.js";
import { analyzeFlow } from "./latency.js";
import { silentLogger, type Logger } from "./logger.js";
import { cloneTrace, spanLatency } from "./trace.js";
import { systemClock, type Clock } from "./utils.js";

const START_CHECKPOINT = "trace_start";
const UNKNOWN_EVENT_TYPE = "unknown";
// Rough per-checkpoint footprint used by getStatistics.
const CHECKPOINT_BYTES_ESTIMATE = 100;

export interface TraceStoreOptions extends Partial<TracingConfig> {
  clock?: Clock;
  logger?: Logger;
}

export interface TraceStoreEvent {
  trace: EventTrace;
}

/**
 * Owns every live event trace. Writers run to completion on the event loop, so
 * each mutation is atomic with respect to other callers; reads hand out copies.
 */
export class TraceStore extends EventEmitter {
  private readonly traces = new Map<string, EventTrace>();
  private readonly maxTraces: number;
  private readonly enableMetadata: boolean;
  private readonly autoCreateOnUnknownCheckpoint: boolean;
  private readonly recordStartCheckpoint: boolean;
  private readonly lostEventTimeoutSeconds: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: TraceStoreOptions = {}) {
    super();
    const defaults = DEFAULT_CONFIG.tracing;
    this.maxTraces = Math.max(1, Math.floor(options.maxTraces ?? defaults.maxTraces));
    this.enableMetadata = options.enableMetadata ?? defaults.enableMetadata;
    this.autoCreateOnUnknownCheckpoint =
      options.autoCreateOnUnknownCheckpoint ?? defaults.autoCreateOnUnknownCheckpoint;
    this.recordStartCheckpoint = options.recordStartCheckpoint ?? defaults.recordStartCheckpoint;
    this.lostEventTimeoutSeconds = options.lostEventTimeoutSeconds ?? defaults.lostEventTimeoutSeconds;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger();
  }

  static fromConfig(config: TracingConfig, extra: { clock?: Clock; logger?: Logger } = {}): TraceStore {
    return new TraceStore({
      maxTraces: config.maxTraces,
      enableMetadata: config.enableMetadata,
      autoCreateOnUnknownCheckpoint: config.autoCreateOnUnknownCheckpoint,
      recordStartCheckpoint: config.recordStartCheckpoint,
      lostEventTimeoutSeconds: config.lostEventTimeoutSeconds,
      ...extra,
    });
  }

  get size(): number {
    return this.traces.size;
  }

  startTrace(eventId: string, eventType: string, metadata?: Record<string, unknown>): EventTrace {
    return cloneTrace(this.insertTrace(eventId, eventType, metadata));
  }

  checkpoint(eventId: string, name: string, metadata?: Record<string, unknown>): void {
    let trace = this.traces.get(eventId);
    if (!trace) {
      if (!this.autoCreateOnUnknownCheckpoint) {
        throw new TraceNotFoundError(eventId);
      }
      this.logger.debug({ eventId, checkpoint: name }, "checkpoint for unknown trace, creating it");
      trace = this.insertTrace(eventId, UNKNOWN_EVENT_TYPE);
    }
    this.appendCheckpoint(trace, name, metadata);
  }

  completeTrace(eventId: string): EventTrace {
    const trace = this.traces.get(eventId);
    if (!trace) {
      throw new TraceNotFoundError(eventId);
    }
    trace.completed = true;
    trace.completedAt = this.clock();
    trace.totalLatency = spanLatency(trace.checkpoints);

    const snapshot = cloneTrace(trace);
    this.emit("completed", { trace: snapshot } satisfies TraceStoreEvent);
    return snapshot;
  }

  getTrace(eventId: string): EventTrace | undefined {
    const trace = this.traces.get(eventId);
    return trace ? cloneTrace(trace) : undefined;
  }

  getAllTraces(): EventTrace[] {
    return Array.from(this.traces.values(), cloneTrace);
  }

  findLostEvents(timeoutSeconds: number = this.lostEventTimeoutSeconds): EventTrace[] {
    const now = this.clock();
    const lost: EventTrace[] = [];
    for (const trace of this.traces.values()) {
      if (!trace.completed && now - trace.createdAt > timeoutSeconds) {
        lost.push(cloneTrace(trace));
      }
    }
    return lost;
  }

  analyzeFlow(): EventFlow {
    return analyzeFlow(this.getAllTraces());
  }

  getStatistics(): TraceStoreStatistics {
    let checkpointCount = 0;
    for (const trace of this.traces.values()) {
      checkpointCount += trace.checkpoints.length;
    }
    return {
      totalTraces: this.traces.size,
      maxTraces: this.maxTraces,
      enableMetadata: this.enableMetadata,
      estimatedMemoryBytes: checkpointCount * CHECKPOINT_BYTES_ESTIMATE,
    };
  }

  clear(): void {
    this.traces.clear();
  }

  private insertTrace(eventId: string, eventType: string, metadata?: Record<string, unknown>): EventTrace {
    // A restarted id replaces its predecessor rather than occupying a second slot.
    if (!this.traces.delete(eventId)) {
      this.evictIfFull();
    }

    const trace: EventTrace = {
      eventId,
      eventType,
      createdAt: this.clock(),
      metadata: this.enableMetadata && metadata ? { ...metadata } : {},
      checkpoints: [],
      completed: false,
      completedAt: null,
      totalLatency: 0,
    };
    this.traces.set(eventId, trace);
    if (this.recordStartCheckpoint) {
      this.appendCheckpoint(trace, START_CHECKPOINT, metadata);
    }
    this.emit("started", { trace: cloneTrace(trace) } satisfies TraceStoreEvent);
    return trace;
  }

  private evictIfFull(): void {
    while (this.traces.size >= this.maxTraces) {
      let oldest: EventTrace | undefined;
      for (const trace of this.traces.values()) {
        if (!oldest || trace.createdAt < oldest.createdAt) oldest = trace;
      }
      if (!oldest) return;
      this.traces.delete(oldest.eventId);
      this.logger.debug({ eventId: oldest.eventId, maxTraces: this.maxTraces }, "evicted oldest trace");
      this.emit("evicted", { trace: cloneTrace(oldest) } satisfies TraceStoreEvent);
    }
  }

  private appendCheckpoint(trace: EventTrace, name: string, metadata?: Record<string, unknown>): void {
    trace.checkpoints.push({
      name,
      timestamp: this.clock(),
      metadata: this.enableMetadata && metadata ? { ...metadata } : {},
      owner: threadId,
    });
    trace.totalLatency = spanLatency(trace.checkpoints);
  }
}
