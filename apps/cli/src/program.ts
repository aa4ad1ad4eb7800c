import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import type { EventTrace } from "@stagewatch/contracts";
import {
  DEFAULT_CONFIG_PATH,
  exportChromeTrace,
  exportTimelineHtml,
  generateLatencyReport,
  loadConfig,
  loadTraceDump,
  mergeConfig,
  saveConfig,
  saveTraceDump,
  simulateTraffic,
} from "@stagewatch/core";
import { runServer } from "@stagewatch/server";
import {
  analyzeTraceSet,
  applyConfigValue,
  consoleIo,
  formatFlowSummary,
  formatTraceAnalysis,
  type CliIo,
} from "./commands.js";

interface GlobalOptions {
  config: string;
}

function toInt(name: string): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative integer, got "${value}"`);
    }
    return parsed;
  };
}

function toPositiveNumber(name: string): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive number, got "${value}"`);
    }
    return parsed;
  };
}

async function writeExports(
  traces: EventTrace[],
  opts: { timeline?: string; html?: string },
  io: CliIo,
): Promise<void> {
  if (opts.timeline) {
    await exportChromeTrace(traces, opts.timeline);
    io.out(`Chrome trace saved to: ${opts.timeline}`);
    io.out("  Open in chrome://tracing or https://ui.perfetto.dev/");
  }
  if (opts.html) {
    await exportTimelineHtml(traces, opts.html);
    io.out(`HTML timeline saved to: ${opts.html}`);
  }
}

export function createProgram(io: CliIo = consoleIo): Command {
  const program = new Command();
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name("stagewatch")
    .description("Event pipeline tracing, latency analysis and live metrics")
    .option("--config <path>", "Config path", process.env.STAGEWATCH_CONFIG ?? DEFAULT_CONFIG_PATH)
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command("dashboard")
    .description("Serve the live metrics dashboard")
    .option("--host <host>", "Bind host")
    .option("--port <port>", "Bind port", toInt("port"))
    .option("--interval <ms>", "Broadcast interval in milliseconds", toPositiveNumber("interval"))
    .action(async (opts: { host?: string; port?: number; interval?: number }) => {
      const dashboard = await runServer({
        configPath: globals().config,
        ...(opts.host !== undefined ? { host: opts.host } : {}),
        ...(opts.port !== undefined ? { port: opts.port } : {}),
        ...(opts.interval !== undefined ? { broadcastIntervalMs: opts.interval } : {}),
      });
      io.out(`stagewatch dashboard: ${dashboard.url ?? "not listening"}`);
    });

  const trace = program.command("trace").description("Event tracing and latency analysis");

  trace
    .command("simulate")
    .description("Trace synthetic event traffic through the pipeline stages")
    .option("--events <n>", "Number of events", toInt("events"), 100)
    .option("--seed <n>", "Random seed", toInt("seed"), 42)
    .option("--output <file>", "Save traces as a JSON dump")
    .option("--timeline <file>", "Write a Chrome trace")
    .option("--html <file>", "Write an HTML timeline")
    .action(async (opts: { events: number; seed: number; output?: string; timeline?: string; html?: string }) => {
      const { store, traces } = simulateTraffic({ events: opts.events, seed: opts.seed });
      io.out(`Traced ${traces.length} events`);
      io.out("");
      for (const line of formatFlowSummary(store.analyzeFlow())) io.out(line);

      if (opts.output) {
        await saveTraceDump(traces, opts.output);
        io.out("");
        io.out(`Traces saved to: ${opts.output}`);
      }
      await writeExports(traces, opts, io);
    });

  trace
    .command("analyze <file>")
    .description("Analyze a saved trace dump")
    .option("--threshold <x>", "Anomaly threshold (multiple of the stage mean)", toPositiveNumber("threshold"), 2.0)
    .option("--json", "JSON output")
    .action(async (file: string, opts: { threshold: number; json?: boolean }) => {
      const dump = await loadTraceDump(file);
      const analysis = analyzeTraceSet(dump.traces, opts.threshold);
      if (opts.json) {
        io.out(JSON.stringify(analysis, null, 2));
        return;
      }
      for (const line of formatTraceAnalysis(analysis)) io.out(line);
    });

  trace
    .command("report <file>")
    .description("Generate a latency report for a saved trace dump")
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (file: string, opts: { output?: string }) => {
      const dump = await loadTraceDump(file);
      const report = generateLatencyReport(dump.traces);
      if (!opts.output) {
        io.out(report);
        return;
      }
      await mkdir(path.dirname(opts.output), { recursive: true });
      await writeFile(opts.output, `${report}\n`, "utf8");
      io.out(`Report saved to: ${opts.output}`);
    });

  trace
    .command("export <file>")
    .description("Export a saved trace dump as a timeline")
    .option("--timeline <file>", "Write a Chrome trace")
    .option("--html <file>", "Write an HTML timeline")
    .action(async (file: string, opts: { timeline?: string; html?: string }) => {
      if (!opts.timeline && !opts.html) {
        throw new Error("nothing to export: pass --timeline and/or --html");
      }
      const dump = await loadTraceDump(file);
      await writeExports(dump.traces, opts, io);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get").action(async () => {
    const config = await loadConfig(globals().config);
    io.out(JSON.stringify(config, null, 2));
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = globals().config;
    const config = await loadConfig(configPath);
    const merged = mergeConfig(applyConfigValue(config, key, value));
    await saveConfig(merged, configPath);
    io.out(`updated ${key}`);
  });

  return program;
}
