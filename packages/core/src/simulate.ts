import type { EventTrace } from "@stagewatch/contracts";
import { TraceStore } from "./traceStore.js";

const EVENT_TYPES = ["click", "keypress", "scroll"] as const;

/** Stage checkpoints in pipeline order with the [min, max) delay in seconds before each. */
export const SIMULATED_STAGES: ReadonlyArray<{ name: string; minDelay: number; maxDelay: number }> = [
  { name: "frontend_emit", minDelay: 0, maxDelay: 0 },
  { name: "tauri_receive", minDelay: 0.001, maxDelay: 0.005 },
  { name: "python_receive", minDelay: 0.002, maxDelay: 0.01 },
  { name: "executor_start", minDelay: 0.005, maxDelay: 0.02 },
  { name: "executor_complete", minDelay: 0.01, maxDelay: 0.05 },
];

export interface SimulationOptions {
  events?: number;
  seed?: number;
  /** Virtual seconds between event starts. */
  spacingSeconds?: number;
  /** Probability that an event reaches its last stage and completes. */
  completionRate?: number;
  startTime?: number;
  maxTraces?: number;
}

export interface SimulationResult {
  store: TraceStore;
  traces: EventTrace[];
}

/** mulberry32: small deterministic PRNG, uniform in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

/**
 * Drives a trace store with synthetic event traffic on a virtual clock, so the
 * same seed always yields the same traces.
 */
export function simulateTraffic(options: SimulationOptions = {}): SimulationResult {
  const events = Math.max(0, Math.floor(options.events ?? 100));
  const spacing = options.spacingSeconds ?? 0.1;
  const completionRate = options.completionRate ?? 0.9;
  const random = seededRandom(options.seed ?? 42);
  const uniform = (min: number, max: number): number => min + (max - min) * random();

  let now = options.startTime ?? 0;
  const store = new TraceStore({
    maxTraces: options.maxTraces ?? Math.max(1, events),
    clock: () => now,
  });

  const lastStage = SIMULATED_STAGES.length - 1;
  for (let idx = 0; idx < events; idx += 1) {
    const eventStart = (options.startTime ?? 0) + idx * spacing;
    now = eventStart;
    const eventId = `evt_${idx}`;
    const eventType = EVENT_TYPES[Math.floor(random() * EVENT_TYPES.length)] ?? "click";
    store.startTrace(eventId, eventType);

    const completes = random() < completionRate;
    SIMULATED_STAGES.forEach((stage, stageIdx) => {
      if (stageIdx === lastStage && !completes) return;
      now += uniform(stage.minDelay, stage.maxDelay);
      store.checkpoint(eventId, stage.name, { stage: stageIdx });
    });
    if (completes) store.completeTrace(eventId);
  }

  return { store, traces: store.getAllTraces() };
}
