export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface Checkpoint {
  name: string;
  /** Seconds, sub-millisecond resolution. */
  timestamp: number;
  metadata: Record<string, unknown>;
  /** Worker thread that recorded the checkpoint (0 on the main thread). */
  owner: number;
}

export interface EventTrace {
  eventId: string;
  eventType: string;
  createdAt: number;
  metadata: Record<string, unknown>;
  checkpoints: Checkpoint[];
  completed: boolean;
  completedAt: number | null;
  totalLatency: number;
}

export interface EventFlow {
  totalEvents: number;
  completedEvents: number;
  lostEvents: number;
  avgLatency: number;
  p95Latency: number;
  p99Latency: number;
  bottleneckStage: string;
  stageLatencies: Record<string, number>;
}

export interface StageLatencyStats {
  mean: number;
  p50: number;
  p95: number;
  p99: number;
  min: number;
  max: number;
  count: number;
}

export interface StageComparison {
  aLatency: number;
  bLatency: number;
  diff: number;
  diffPct: number;
}

export interface LatencyAnomaly {
  eventId: string;
  trace: EventTrace;
  stage: string;
  latency: number;
  stageMean: number;
}

export interface TraceStoreStatistics {
  totalTraces: number;
  maxTraces: number;
  enableMetadata: boolean;
  estimatedMemoryBytes: number;
}

// Wire schema: field names and nesting are consumed by dashboard viewers as-is.

export interface SystemMetrics {
  timestamp: number;
  cpu_percent: number;
  memory_mb: number;
  memory_percent: number;
  thread_count: number;
  process_count: number;
}

export interface ActionMetrics {
  timestamp: number;
  total_actions: number;
  actions_per_minute: number;
  avg_duration: number;
  current_action: string | null;
  queue_depth: number;
  success_rate: number;
  error_count: number;
}

export interface EventMetrics {
  timestamp: number;
  events_queued: number;
  events_processed: number;
  events_failed: number;
  avg_processing_time: number;
  queue_depth: number;
}

export interface MetricsSnapshot {
  system: SystemMetrics;
  actions: ActionMetrics;
  events: EventMetrics;
}

export interface ActionRecord {
  timestamp: number;
  name: string;
  duration: number;
  success: boolean;
}

export interface PingMessage {
  type: "ping";
  timestamp: number | null;
}

export interface PongMessage {
  type: "pong";
  timestamp: number | null;
}

export interface RequestMetricsMessage {
  type: "request_metrics";
}

export type ClientMessage = PingMessage | RequestMetricsMessage;

export interface TraceDump {
  version: 1;
  exportedAt: number;
  traces: EventTrace[];
}

export type ChromeTracePhase = "i" | "X";

export interface ChromeTraceEvent {
  name: string;
  cat: string;
  ph: ChromeTracePhase;
  /** Microseconds. */
  ts: number;
  dur?: number;
  pid: number;
  tid: number;
  s?: "g" | "t";
  args: Record<string, unknown>;
}

export interface ChromeTraceDocument {
  traceEvents: ChromeTraceEvent[];
  displayTimeUnit: "ms";
  otherData: {
    version: string;
    trace_count: number;
  };
}

export interface TracingConfig {
  maxTraces: number;
  enableMetadata: boolean;
  autoCreateOnUnknownCheckpoint: boolean;
  recordStartCheckpoint: boolean;
  lostEventTimeoutSeconds: number;
}

export interface SamplerConfig {
  intervalMs: number;
  queueCapacity: number;
  historySize: number;
  actionWindowMs: number;
}

export interface DashboardConfig {
  host: string;
  port: number;
  broadcastIntervalMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface AppConfig {
  tracing: TracingConfig;
  sampler: SamplerConfig;
  dashboard: DashboardConfig;
  logging: LoggingConfig;
}
