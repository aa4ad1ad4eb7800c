import type { Checkpoint, EventTrace } from "@stagewatch/contracts";

export function stageName(from: string, to: string): string {
  return `${from} -> ${to}`;
}

/**
 * Latency of every consecutive checkpoint pair, keyed by stage name. A stage
 * that repeats within one trace keeps its last occurrence.
 */
export function stageLatencies(trace: EventTrace): Map<string, number> {
  const latencies = new Map<string, number>();
  for (let idx = 0; idx < trace.checkpoints.length - 1; idx += 1) {
    const current = trace.checkpoints[idx];
    const next = trace.checkpoints[idx + 1];
    if (!current || !next) continue;
    latencies.set(stageName(current.name, next.name), next.timestamp - current.timestamp);
  }
  return latencies;
}

/** Seconds between the last occurrences of two named checkpoints. */
export function latencyBetween(trace: EventTrace, fromCheckpoint: string, toCheckpoint: string): number {
  let fromIdx = -1;
  let toIdx = -1;
  trace.checkpoints.forEach((checkpoint, idx) => {
    if (checkpoint.name === fromCheckpoint) fromIdx = idx;
    if (checkpoint.name === toCheckpoint) toIdx = idx;
  });

  const from = trace.checkpoints[fromIdx];
  const to = trace.checkpoints[toIdx];
  if (!from) throw new Error(`checkpoint not found: ${fromCheckpoint}`);
  if (!to) throw new Error(`checkpoint not found: ${toCheckpoint}`);
  if (toIdx <= fromIdx) throw new Error(`${toCheckpoint} must come after ${fromCheckpoint}`);
  return to.timestamp - from.timestamp;
}

export function spanLatency(checkpoints: Checkpoint[]): number {
  if (checkpoints.length < 2) return 0;
  const first = checkpoints[0];
  const last = checkpoints[checkpoints.length - 1];
  if (!first || !last) return 0;
  return Math.max(0, last.timestamp - first.timestamp);
}

function cloneCheckpoint(checkpoint: Checkpoint): Checkpoint {
  return { ...checkpoint, metadata: { ...checkpoint.metadata } };
}

export function cloneTrace(trace: EventTrace): EventTrace {
  return {
    ...trace,
    metadata: { ...trace.metadata },
    checkpoints: trace.checkpoints.map(cloneCheckpoint),
  };
}
