import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Checkpoint, EventTrace, TraceDump } from "@stagewatch/contracts";
import { asErrorMessage, TraceFileError } from "./errors.js";
import { spanLatency } from "./trace.js";
import { asArray, asFiniteNumber, asRecord, systemClock, type Clock } from "./utils.js";

export const TRACE_DUMP_VERSION = 1;

export function toTraceDump(traces: EventTrace[], clock: Clock = systemClock): TraceDump {
  return { version: TRACE_DUMP_VERSION, exportedAt: clock(), traces };
}

function parseCheckpoint(value: unknown): Checkpoint | null {
  const raw = asRecord(value);
  const timestamp = asFiniteNumber(raw.timestamp);
  if (typeof raw.name !== "string" || !raw.name || timestamp === null) return null;
  return {
    name: raw.name,
    timestamp,
    metadata: { ...asRecord(raw.metadata) },
    owner: asFiniteNumber(raw.owner) ?? 0,
  };
}

function parseTrace(value: unknown): EventTrace | null {
  const raw = asRecord(value);
  if (typeof raw.eventId !== "string" || !raw.eventId) return null;

  const checkpoints: Checkpoint[] = [];
  for (const item of asArray(raw.checkpoints)) {
    const checkpoint = parseCheckpoint(item);
    if (checkpoint) checkpoints.push(checkpoint);
  }
  const createdAt = asFiniteNumber(raw.createdAt) ?? checkpoints[0]?.timestamp;
  if (createdAt === undefined) return null;

  const completed = raw.completed === true;
  return {
    eventId: raw.eventId,
    eventType: typeof raw.eventType === "string" && raw.eventType ? raw.eventType : "unknown",
    createdAt,
    metadata: { ...asRecord(raw.metadata) },
    checkpoints,
    completed,
    completedAt: completed ? asFiniteNumber(raw.completedAt) : null,
    // Recomputed so a hand-edited file cannot disagree with its own checkpoints.
    totalLatency: spanLatency(checkpoints),
  };
}

/**
 * Accepts a dump object or a bare array of traces. Malformed traces and
 * checkpoints are skipped; anything else that is not a dump is rejected.
 */
export function parseTraceDump(value: unknown): TraceDump {
  let rawTraces: unknown[];
  let exportedAt = 0;
  if (Array.isArray(value)) {
    rawTraces = value;
  } else {
    const raw = asRecord(value);
    if (!Array.isArray(raw.traces)) {
      throw new Error("expected a trace dump with a traces array");
    }
    if (raw.version !== undefined && raw.version !== TRACE_DUMP_VERSION) {
      throw new Error(`unsupported trace dump version ${String(raw.version)}`);
    }
    rawTraces = raw.traces;
    exportedAt = asFiniteNumber(raw.exportedAt) ?? 0;
  }

  const traces: EventTrace[] = [];
  for (const item of rawTraces) {
    const trace = parseTrace(item);
    if (trace) traces.push(trace);
  }
  return { version: TRACE_DUMP_VERSION, exportedAt, traces };
}

export async function saveTraceDump(
  traces: EventTrace[],
  outputPath: string,
  clock: Clock = systemClock,
): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(toTraceDump(traces, clock), null, 2)}\n`, "utf8");
}

export async function loadTraceDump(filePath: string): Promise<TraceDump> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new TraceFileError(filePath, asErrorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new TraceFileError(filePath, `invalid JSON (${asErrorMessage(error)})`);
  }

  try {
    return parseTraceDump(parsed);
  } catch (error) {
    throw new TraceFileError(filePath, asErrorMessage(error));
  }
}
