import { threadId } from "node:worker_threads";
import { describe, expect, it } from "vitest";
import type { EventTrace } from "@stagewatch/contracts";
import { mergeConfig } from "../config.js";
import { TraceNotFoundError } from "../errors.js";
import { TraceStore, type TraceStoreEvent } from "../traceStore.js";

function manualClock(start = 0): { clock: () => number; set: (value: number) => void } {
  let now = start;
  return {
    clock: () => now,
    set: (value) => {
      now = value;
    },
  };
}

describe("trace store", () => {
  it("keeps every distinct id retrievable below capacity", () => {
    const store = new TraceStore({ maxTraces: 10 });
    for (let idx = 0; idx < 10; idx += 1) {
      store.startTrace(`evt_${idx}`, "click");
    }
    expect(store.size).toBe(10);
    for (let idx = 0; idx < 10; idx += 1) {
      expect(store.getTrace(`evt_${idx}`)?.eventId).toBe(`evt_${idx}`);
    }
  });

  it("evicts exactly the oldest trace when capacity is exceeded", () => {
    const time = manualClock(100);
    const store = new TraceStore({ maxTraces: 3, clock: time.clock });
    const evicted: string[] = [];
    store.on("evicted", (event: TraceStoreEvent) => evicted.push(event.trace.eventId));

    time.set(100);
    store.startTrace("b", "click");
    time.set(99);
    store.startTrace("a", "click");
    time.set(101);
    store.startTrace("c", "click");
    time.set(102);
    store.startTrace("d", "click");

    expect(store.size).toBe(3);
    expect(store.getTrace("a")).toBeUndefined();
    expect(store.getAllTraces().map((trace) => trace.eventId).sort()).toEqual(["b", "c", "d"]);
    expect(evicted).toEqual(["a"]);
  });

  it("replaces a live trace when its id is started again", () => {
    const time = manualClock(1);
    const store = new TraceStore({ maxTraces: 2, clock: time.clock });
    store.startTrace("a", "click");
    store.checkpoint("a", "first");
    store.startTrace("b", "click");

    time.set(2);
    const restarted = store.startTrace("a", "scroll");
    expect(store.size).toBe(2);
    expect(restarted.eventType).toBe("scroll");
    expect(restarted.checkpoints).toEqual([]);
    expect(store.getTrace("b")).toBeDefined();
  });

  it("computes total latency from the first to the last checkpoint", () => {
    const time = manualClock(1000);
    const store = new TraceStore({ clock: time.clock });
    store.startTrace("evt_1", "click", { button: "left" });
    store.checkpoint("evt_1", "frontend_emit");
    time.set(1000.003);
    store.checkpoint("evt_1", "tauri_receive");
    time.set(1000.01);
    store.checkpoint("evt_1", "python_receive");
    time.set(1000.5);

    const completed = store.completeTrace("evt_1");
    expect(completed.completed).toBe(true);
    expect(completed.completedAt).toBe(1000.5);
    expect(completed.totalLatency).toBeCloseTo(0.01, 9);
    expect(completed.metadata).toEqual({ button: "left" });
    expect(completed.checkpoints.map((checkpoint) => checkpoint.name)).toEqual([
      "frontend_emit",
      "tauri_receive",
      "python_receive",
    ]);
    expect(completed.checkpoints[0]?.owner).toBe(threadId);
  });

  it("keeps latency zero for fewer than two checkpoints", () => {
    const store = new TraceStore();
    store.startTrace("solo", "click");
    store.checkpoint("solo", "only");
    expect(store.completeTrace("solo").totalLatency).toBe(0);
  });

  it("auto-creates unknown traces on checkpoint by default", () => {
    const store = new TraceStore();
    store.checkpoint("ghost", "frontend_emit");
    const trace = store.getTrace("ghost");
    expect(trace?.eventType).toBe("unknown");
    expect(trace?.checkpoints).toHaveLength(1);
  });

  it("rejects checkpoints for unknown traces when auto-create is off", () => {
    const store = new TraceStore({ autoCreateOnUnknownCheckpoint: false });
    expect(() => store.checkpoint("ghost", "frontend_emit")).toThrow(TraceNotFoundError);
    expect(store.size).toBe(0);
  });

  it("fails to complete an unknown trace", () => {
    const store = new TraceStore();
    expect(() => store.completeTrace("missing")).toThrow("trace not found: missing");
  });

  it("records a start checkpoint when configured", () => {
    const store = new TraceStore({ recordStartCheckpoint: true });
    const trace = store.startTrace("evt", "click");
    expect(trace.checkpoints.map((checkpoint) => checkpoint.name)).toEqual(["trace_start"]);
  });

  it("drops metadata when disabled", () => {
    const store = new TraceStore({ enableMetadata: false });
    store.startTrace("evt", "click", { secret: "test-secret" });
    store.checkpoint("evt", "stage", { detail: 1 });
    const trace = store.getTrace("evt");
    expect(trace?.metadata).toEqual({});
    expect(trace?.checkpoints[0]?.metadata).toEqual({});
  });

  it("hands out copies that do not alias stored state", () => {
    const store = new TraceStore();
    store.startTrace("evt", "click", { attempt: 1 });
    store.checkpoint("evt", "stage");

    const copy: EventTrace | undefined = store.getTrace("evt");
    copy?.checkpoints.push({ name: "injected", timestamp: 0, metadata: {}, owner: 0 });
    if (copy) copy.metadata.attempt = 2;

    const fresh = store.getTrace("evt");
    expect(fresh?.checkpoints).toHaveLength(1);
    expect(fresh?.metadata).toEqual({ attempt: 1 });
  });

  it("finds incomplete traces older than the timeout", () => {
    const time = manualClock(10);
    const store = new TraceStore({ clock: time.clock });
    store.startTrace("stale", "click");
    store.startTrace("done", "click");
    store.completeTrace("done");
    time.set(14);
    store.startTrace("fresh", "click");

    time.set(16);
    expect(store.findLostEvents(5).map((trace) => trace.eventId)).toEqual(["stale"]);
    expect(store.findLostEvents(10)).toEqual([]);
    expect(store.findLostEvents().map((trace) => trace.eventId)).toEqual(["stale"]);
  });

  it("uses the configured lost-event timeout by default", () => {
    const time = manualClock(0);
    const store = TraceStore.fromConfig({ ...mergeConfig().tracing, lostEventTimeoutSeconds: 1 }, { clock: time.clock });
    store.startTrace("older", "click");
    time.set(3);
    store.startTrace("newer", "click");
    time.set(4.5);
    expect(store.findLostEvents().map((trace) => trace.eventId)).toEqual(["older", "newer"]);
  });

  it("reports statistics and clears", () => {
    const store = new TraceStore({ maxTraces: 7 });
    store.startTrace("a", "click");
    store.checkpoint("a", "one");
    store.checkpoint("a", "two");

    expect(store.getStatistics()).toEqual({
      totalTraces: 1,
      maxTraces: 7,
      enableMetadata: true,
      estimatedMemoryBytes: 200,
    });
    store.clear();
    expect(store.size).toBe(0);
    expect(store.analyzeFlow().totalEvents).toBe(0);
  });

  it("emits started and completed events", () => {
    const store = new TraceStore();
    const seen: string[] = [];
    store.on("started", (event: TraceStoreEvent) => seen.push(`started:${event.trace.eventId}`));
    store.on("completed", (event: TraceStoreEvent) => seen.push(`completed:${event.trace.eventId}`));
    store.startTrace("evt", "click");
    store.completeTrace("evt");
    expect(seen).toEqual(["started:evt", "completed:evt"]);
  });
});
