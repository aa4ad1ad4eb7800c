import type {
  EventFlow,
  EventTrace,
  LatencyAnomaly,
  StageComparison,
  StageLatencyStats,
} from "@stagewatch/contracts";
import { stageLatencies } from "./trace.js";
import { fmtMs, mean, nearestRank } from "./utils.js";

export const NO_BOTTLENECK = "N/A";
const REPORT_RULE = "=".repeat(60);
const REPORT_SUBRULE = "-".repeat(60);
const REPORT_MAX_ANOMALIES = 10;

function collectStageSamples(traces: EventTrace[]): Map<string, number[]> {
  const samples = new Map<string, number[]>();
  for (const trace of traces) {
    for (const [stage, latency] of stageLatencies(trace)) {
      const bucket = samples.get(stage);
      if (bucket) bucket.push(latency);
      else samples.set(stage, [latency]);
    }
  }
  return samples;
}

function summarizeSamples(values: number[]): StageLatencyStats {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    mean: mean(values),
    p50: nearestRank(sorted, 0.5),
    p95: nearestRank(sorted, 0.95),
    p99: nearestRank(sorted, 0.99),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    count: sorted.length,
  };
}

export function analyzeLatencies(traces: EventTrace[]): Record<string, StageLatencyStats> {
  const result: Record<string, StageLatencyStats> = {};
  for (const [stage, values] of collectStageSamples(traces)) {
    if (values.length === 0) continue;
    result[stage] = summarizeSamples(values);
  }
  return result;
}

function slowestStage(stats: Record<string, StageLatencyStats>): string {
  let bottleneck = NO_BOTTLENECK;
  let highest = Number.NEGATIVE_INFINITY;
  for (const [stage, row] of Object.entries(stats)) {
    if (row.mean > highest) {
      highest = row.mean;
      bottleneck = stage;
    }
  }
  return bottleneck;
}

export function findBottleneck(traces: EventTrace[]): string {
  return slowestStage(analyzeLatencies(traces));
}

/**
 * Flags each trace at most once, at the first stage slower than
 * `threshold` times that stage's mean across all traces.
 */
export function detectAnomalies(traces: EventTrace[], threshold = 2.0): LatencyAnomaly[] {
  const stats = analyzeLatencies(traces);
  const anomalies: LatencyAnomaly[] = [];

  for (const trace of traces) {
    for (const [stage, latency] of stageLatencies(trace)) {
      const row = stats[stage];
      if (!row) continue;
      if (latency > row.mean * threshold) {
        anomalies.push({ eventId: trace.eventId, trace, stage, latency, stageMean: row.mean });
        break;
      }
    }
  }
  return anomalies;
}

/** Events per second for each fixed window between the first and last trace creation. */
export function calculateThroughput(traces: EventTrace[], windowSeconds = 1.0): Record<string, number> {
  if (traces.length === 0 || windowSeconds <= 0) return {};

  let minTime = Number.POSITIVE_INFINITY;
  let maxTime = Number.NEGATIVE_INFINITY;
  for (const trace of traces) {
    minTime = Math.min(minTime, trace.createdAt);
    maxTime = Math.max(maxTime, trace.createdAt);
  }

  const windows: Record<string, number> = {};
  for (let windowIdx = 0; minTime + windowIdx * windowSeconds <= maxTime; windowIdx += 1) {
    const windowStart = minTime + windowIdx * windowSeconds;
    const windowEnd = windowStart + windowSeconds;
    let count = 0;
    for (const trace of traces) {
      if (trace.createdAt >= windowStart && trace.createdAt < windowEnd) count += 1;
    }
    windows[windowStart.toFixed(1)] = count / windowSeconds;
  }
  return windows;
}

export function compareTraces(a: EventTrace, b: EventTrace): Record<string, StageComparison> {
  const latenciesA = stageLatencies(a);
  const latenciesB = stageLatencies(b);
  const result: Record<string, StageComparison> = {};

  for (const [stage, aLatency] of latenciesA) {
    const bLatency = latenciesB.get(stage);
    if (bLatency === undefined) continue;
    const diff = bLatency - aLatency;
    result[stage] = {
      aLatency,
      bLatency,
      diff,
      diffPct: aLatency > 0 ? (diff / aLatency) * 100 : 0,
    };
  }
  return result;
}

export function analyzeFlow(traces: EventTrace[]): EventFlow {
  if (traces.length === 0) {
    return {
      totalEvents: 0,
      completedEvents: 0,
      lostEvents: 0,
      avgLatency: 0,
      p95Latency: 0,
      p99Latency: 0,
      bottleneckStage: NO_BOTTLENECK,
      stageLatencies: {},
    };
  }

  const completedEvents = traces.filter((trace) => trace.completed).length;
  const latencies = traces.map((trace) => trace.totalLatency).filter((latency) => latency > 0);
  const sortedLatencies = [...latencies].sort((a, b) => a - b);
  const stats = analyzeLatencies(traces);

  const stageMeans: Record<string, number> = {};
  for (const [stage, row] of Object.entries(stats)) {
    stageMeans[stage] = row.mean;
  }

  return {
    totalEvents: traces.length,
    completedEvents,
    lostEvents: traces.length - completedEvents,
    avgLatency: mean(latencies),
    p95Latency: nearestRank(sortedLatencies, 0.95),
    p99Latency: nearestRank(sortedLatencies, 0.99),
    bottleneckStage: slowestStage(stats),
    stageLatencies: stageMeans,
  };
}

export function generateLatencyReport(traces: EventTrace[]): string {
  if (traces.length === 0) {
    return "No traces to analyze.";
  }

  const stats = analyzeLatencies(traces);
  const anomalies = detectAnomalies(traces);
  const completed = traces.filter((trace) => trace.completed).length;

  const lines: string[] = [
    REPORT_RULE,
    "LATENCY ANALYSIS REPORT",
    REPORT_RULE,
    "",
    `Total Events: ${traces.length}`,
    `Completed Events: ${completed}`,
    `Bottleneck Stage: ${slowestStage(stats)}`,
    `Anomalies Detected: ${anomalies.length}`,
    "",
    REPORT_RULE,
    "STAGE LATENCIES",
    REPORT_RULE,
  ];

  const stages = Object.entries(stats).sort((a, b) => b[1].mean - a[1].mean);
  for (const [stage, row] of stages) {
    lines.push(
      "",
      stage,
      REPORT_SUBRULE,
      `  Count:  ${row.count}`,
      `  Mean:   ${fmtMs(row.mean)}`,
      `  P50:    ${fmtMs(row.p50)}`,
      `  P95:    ${fmtMs(row.p95)}`,
      `  P99:    ${fmtMs(row.p99)}`,
      `  Min:    ${fmtMs(row.min)}`,
      `  Max:    ${fmtMs(row.max)}`,
    );
  }

  if (anomalies.length > 0) {
    lines.push("", REPORT_RULE, "ANOMALIES", REPORT_RULE, "");
    for (const anomaly of anomalies.slice(0, REPORT_MAX_ANOMALIES)) {
      const factor = anomaly.stageMean > 0 ? anomaly.latency / anomaly.stageMean : 0;
      lines.push(`  ${anomaly.eventId}: ${anomaly.stage}`);
      lines.push(`    Latency: ${fmtMs(anomaly.latency)} (${factor.toFixed(1)}x average)`);
    }
    if (anomalies.length > REPORT_MAX_ANOMALIES) {
      lines.push(`  ... and ${anomalies.length - REPORT_MAX_ANOMALIES} more`);
    }
  }

  lines.push("", REPORT_RULE);
  return lines.join("\n");
}
