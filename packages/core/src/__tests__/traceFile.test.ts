import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { TraceFileError } from "../errors.js";
import { analyzeFlow } from "../latency.js";
import { seededRandom, simulateTraffic, SIMULATED_STAGES } from "../simulate.js";
import { loadTraceDump, parseTraceDump, saveTraceDump } from "../traceFile.js";

async function createTempRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "stagewatch-traces-"));
}

describe("trace dump files", () => {
  it("round-trips simulated traces", async () => {
    const root = await createTempRoot();
    const filePath = path.join(root, "dumps", "events.json");
    const { traces } = simulateTraffic({ events: 5, seed: 7 });

    await saveTraceDump(traces, filePath, () => 5);
    const dump = await loadTraceDump(filePath);
    expect(dump.version).toBe(1);
    expect(dump.exportedAt).toBe(5);
    expect(dump.traces).toEqual(traces);
  });

  it("skips malformed traces and checkpoints", () => {
    const dump = parseTraceDump({
      version: 1,
      exportedAt: 12,
      traces: [
        {
          eventId: "evt_1",
          eventType: "click",
          createdAt: 1,
          checkpoints: [
            { name: "a", timestamp: 1 },
            { name: "", timestamp: 1.5 },
            { name: "b", timestamp: "late" },
            { name: "c", timestamp: 1.25, metadata: { ok: true }, owner: 2 },
          ],
          completed: true,
          completedAt: 2,
          totalLatency: 99,
        },
        { eventType: "click" },
        "not a trace",
        { eventId: "evt_2" },
      ],
    });

    expect(dump.exportedAt).toBe(12);
    expect(dump.traces).toEqual([
      {
        eventId: "evt_1",
        eventType: "click",
        createdAt: 1,
        metadata: {},
        checkpoints: [
          { name: "a", timestamp: 1, metadata: {}, owner: 0 },
          { name: "c", timestamp: 1.25, metadata: { ok: true }, owner: 2 },
        ],
        completed: true,
        completedAt: 2,
        totalLatency: 0.25,
      },
    ]);
  });

  it("accepts a bare array of traces", () => {
    const dump = parseTraceDump([{ eventId: "evt_1", checkpoints: [{ name: "a", timestamp: 3 }] }]);
    expect(dump.traces[0]?.createdAt).toBe(3);
    expect(dump.traces[0]?.eventType).toBe("unknown");
    expect(dump.traces[0]?.completed).toBe(false);
    expect(dump.traces[0]?.completedAt).toBeNull();
  });

  it("rejects documents that are not trace dumps", () => {
    expect(() => parseTraceDump({ events: [] })).toThrow("expected a trace dump with a traces array");
    expect(() => parseTraceDump({ version: 2, traces: [] })).toThrow("unsupported trace dump version 2");
  });

  it("wraps unreadable files in TraceFileError", async () => {
    const root = await createTempRoot();
    const missing = path.join(root, "missing.json");
    await expect(loadTraceDump(missing)).rejects.toBeInstanceOf(TraceFileError);

    const broken = path.join(root, "broken.json");
    await writeFile(broken, "{not json", "utf8");
    await expect(loadTraceDump(broken)).rejects.toThrow(`cannot read trace file ${broken}: invalid JSON`);
  });
});

describe("traffic simulation", () => {
  it("is deterministic for a seed", () => {
    const first = simulateTraffic({ events: 10, seed: 3 }).traces;
    const second = simulateTraffic({ events: 10, seed: 3 }).traces;
    const other = simulateTraffic({ events: 10, seed: 4 }).traces;
    expect(second).toEqual(first);
    expect(other).not.toEqual(first);
  });

  it("spaces events on the virtual clock and walks the stages in order", () => {
    const { traces, store } = simulateTraffic({ events: 20, seed: 11, spacingSeconds: 0.5 });
    expect(store.size).toBe(20);
    expect(traces.map((trace) => trace.eventId)).toEqual(Array.from({ length: 20 }, (_, idx) => `evt_${idx}`));
    expect(traces[4]?.createdAt).toBe(2);

    const stageNames = SIMULATED_STAGES.map((stage) => stage.name);
    for (const trace of traces) {
      const names = trace.checkpoints.map((checkpoint) => checkpoint.name);
      expect(names).toEqual(stageNames.slice(0, trace.completed ? stageNames.length : stageNames.length - 1));
      expect(["click", "keypress", "scroll"]).toContain(trace.eventType);
    }
    expect(analyzeFlow(traces).bottleneckStage).toBe("executor_start -> executor_complete");
  });

  it("completes nothing when the completion rate is zero", () => {
    const { traces } = simulateTraffic({ events: 5, completionRate: 0 });
    expect(traces.every((trace) => !trace.completed)).toBe(true);
  });

  it("draws uniformly from [0, 1)", () => {
    const random = seededRandom(1);
    for (let idx = 0; idx < 1000; idx += 1) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
