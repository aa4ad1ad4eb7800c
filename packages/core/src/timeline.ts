import { readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ChromeTraceDocument, ChromeTraceEvent, EventTrace } from "@stagewatch/contracts";

export const CHROME_TRACE_VERSION = "stagewatch-1.0";
const TRACE_DATA_PLACEHOLDER = "__TRACE_DATA__";
const TIMELINE_TEMPLATE_URL = new URL("../templates/timeline.html", import.meta.url);

let timelineTemplate: string | null = null;

function toMicros(seconds: number): number {
  return Math.trunc(seconds * 1_000_000);
}

function traceEvents(trace: EventTrace): ChromeTraceEvent[] {
  const events: ChromeTraceEvent[] = [
    {
      name: `${trace.eventType}:${trace.eventId}`,
      cat: "metadata",
      ph: "i",
      ts: toMicros(trace.createdAt),
      pid: 0,
      tid: 0,
      s: "g",
      args: {
        event_id: trace.eventId,
        event_type: trace.eventType,
        completed: trace.completed,
        total_latency: trace.totalLatency,
      },
    },
  ];

  trace.checkpoints.forEach((checkpoint, idx) => {
    const next = trace.checkpoints[idx + 1];
    if (next) {
      events.push({
        name: checkpoint.name,
        cat: trace.eventType,
        ph: "X",
        ts: toMicros(checkpoint.timestamp),
        dur: toMicros(next.timestamp - checkpoint.timestamp),
        pid: 0,
        tid: checkpoint.owner,
        args: { ...checkpoint.metadata },
      });
    }
    events.push({
      name: `checkpoint:${checkpoint.name}`,
      cat: trace.eventType,
      ph: "i",
      ts: toMicros(checkpoint.timestamp),
      pid: 0,
      tid: checkpoint.owner,
      s: "t",
      args: { ...checkpoint.metadata },
    });
  });
  return events;
}

/** Chrome Trace Event Format document, loadable by chrome://tracing and Perfetto. */
export function buildChromeTrace(traces: EventTrace[]): ChromeTraceDocument {
  return {
    traceEvents: traces.flatMap(traceEvents),
    displayTimeUnit: "ms",
    otherData: {
      version: CHROME_TRACE_VERSION,
      trace_count: traces.length,
    },
  };
}

// JSON inside a <script> element must not be able to close it.
function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

function loadTimelineTemplate(): string {
  timelineTemplate ??= readFileSync(TIMELINE_TEMPLATE_URL, "utf8");
  return timelineTemplate;
}

export function renderTimelineHtml(traces: EventTrace[]): string {
  const data = embedJson(traces);
  return loadTimelineTemplate().replace(TRACE_DATA_PLACEHOLDER, () => data);
}

async function writeOutput(outputPath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, contents, "utf8");
}

export async function exportChromeTrace(traces: EventTrace[], outputPath: string): Promise<void> {
  await writeOutput(outputPath, `${JSON.stringify(buildChromeTrace(traces), null, 2)}\n`);
}

export async function exportTimelineHtml(traces: EventTrace[], outputPath: string): Promise<void> {
  await writeOutput(outputPath, renderTimelineHtml(traces));
}
