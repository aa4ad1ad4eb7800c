import type { EventFlow, EventTrace, LatencyAnomaly, StageLatencyStats } from "@stagewatch/contracts";
import {
  analyzeLatencies,
  calculateThroughput,
  detectAnomalies,
  findBottleneck,
  fmtMs,
  isRecord,
  type PartialAppConfigInput,
} from "@stagewatch/core";

const TOP_STAGE_COUNT = 5;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function formatTable(rows: string[][]): string[] {
  const header = rows[0];
  if (!header) return [];
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  const lines: string[] = [];
  for (const [idx, row] of rows.entries()) {
    lines.push(
      row
        .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
        .join(idx === 0 ? " | " : "   ")
        .trimEnd(),
    );
    if (idx === 0) {
      lines.push(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
  return lines;
}

export function formatFlowSummary(flow: EventFlow): string[] {
  const lines = [
    "Event Flow Analysis:",
    `  Total events: ${flow.totalEvents}`,
    `  Completed: ${flow.completedEvents}`,
    `  Lost: ${flow.lostEvents}`,
    `  Avg latency: ${fmtMs(flow.avgLatency)}`,
    `  P95 latency: ${fmtMs(flow.p95Latency)}`,
    `  P99 latency: ${fmtMs(flow.p99Latency)}`,
    `  Bottleneck: ${flow.bottleneckStage}`,
  ];

  const stages = Object.entries(flow.stageLatencies)
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_STAGE_COUNT);
  if (stages.length > 0) {
    lines.push("", "Stage Latencies:");
    for (const [stage, latency] of stages) {
      lines.push(`  ${stage}: ${fmtMs(latency)}`);
    }
  }
  return lines;
}

export interface TraceAnalysis {
  traceCount: number;
  completedCount: number;
  bottleneck: string;
  threshold: number;
  stages: Record<string, StageLatencyStats>;
  anomalies: Array<Omit<LatencyAnomaly, "trace">>;
  throughput: Record<string, number>;
}

export function analyzeTraceSet(traces: EventTrace[], threshold = 2.0): TraceAnalysis {
  return {
    traceCount: traces.length,
    completedCount: traces.filter((trace) => trace.completed).length,
    bottleneck: findBottleneck(traces),
    threshold,
    stages: analyzeLatencies(traces),
    anomalies: detectAnomalies(traces, threshold).map(({ eventId, stage, latency, stageMean }) => ({
      eventId,
      stage,
      latency,
      stageMean,
    })),
    throughput: calculateThroughput(traces),
  };
}

export function formatTraceAnalysis(analysis: TraceAnalysis): string[] {
  const lines = [
    `Traces: ${analysis.traceCount} (${analysis.completedCount} completed)`,
    `Bottleneck: ${analysis.bottleneck}`,
  ];

  const stages = Object.entries(analysis.stages).sort((a, b) => b[1].mean - a[1].mean);
  if (stages.length > 0) {
    lines.push("");
    lines.push(
      ...formatTable([
        ["Stage", "Count", "Mean", "P50", "P95", "P99", "Max"],
        ...stages.map(([stage, row]) => [
          stage,
          String(row.count),
          fmtMs(row.mean),
          fmtMs(row.p50),
          fmtMs(row.p95),
          fmtMs(row.p99),
          fmtMs(row.max),
        ]),
      ]),
    );
  }

  lines.push("", `Anomalies (> ${analysis.threshold.toFixed(1)}x stage mean): ${analysis.anomalies.length}`);
  for (const anomaly of analysis.anomalies) {
    lines.push(`  ${anomaly.eventId}: ${anomaly.stage} ${fmtMs(anomaly.latency)} (mean ${fmtMs(anomaly.stageMean)})`);
  }
  return lines;
}

export function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    cursor[key] = created;
    cursor = created;
  }
  cursor[lastKey] = value;
}

/** Applies `key=value` to a plain copy of the config, ready for mergeConfig. */
export function applyConfigValue(config: object, dottedKey: string, rawValue: string): PartialAppConfigInput {
  const mutable: Record<string, unknown> = JSON.parse(JSON.stringify(config));
  setPath(mutable, dottedKey, parseValue(rawValue));
  const section = (name: string): Record<string, unknown> | undefined => {
    const value = mutable[name];
    return isRecord(value) ? value : undefined;
  };

  const input: PartialAppConfigInput = {};
  const tracing = section("tracing");
  const sampler = section("sampler");
  const dashboard = section("dashboard");
  const logging = section("logging");
  if (tracing) input.tracing = tracing;
  if (sampler) input.sampler = sampler;
  if (dashboard) input.dashboard = dashboard;
  if (logging) input.logging = logging;
  return input;
}
