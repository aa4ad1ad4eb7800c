import { readdir, readFile } from "node:fs/promises";
import os from "node:os";

/**
 * Samples the host process. Readings that touch the filesystem are async so a
 * sampler tick never blocks the event loop. Implementations may throw or
 * reject; the sampler recovers.
 */
export interface ResourceProbe {
  cpuPercent(): number;
  rssBytes(): number;
  memoryPercent(): number;
  threadCount(): Promise<number>;
  processCount(): Promise<number>;
}

const PROC_ROOT = "/proc";

async function readStatusField(pid: number | "self", field: string): Promise<number | null> {
  const status = await readFile(`${PROC_ROOT}/${pid}/status`, "utf8");
  for (const line of status.split("\n")) {
    if (!line.startsWith(`${field}:`)) continue;
    const parsed = Number.parseInt(line.slice(field.length + 1).trim(), 10);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Parent pid from /proc/<pid>/stat; the command name may itself contain spaces or parens. */
export function parseParentPid(stat: string): number | null {
  const closeParen = stat.lastIndexOf(")");
  if (closeParen < 0) return null;
  const fields = stat.slice(closeParen + 2).split(" ");
  const ppid = Number.parseInt(fields[1] ?? "", 10);
  return Number.isFinite(ppid) ? ppid : null;
}

/** Counts `rootPid` plus every descendant in a pid → parent pid table. */
export function countProcessTree(rootPid: number, parents: Map<number, number>): number {
  const children = new Map<number, number[]>();
  for (const [pid, ppid] of parents) {
    const siblings = children.get(ppid);
    if (siblings) siblings.push(pid);
    else children.set(ppid, [pid]);
  }

  let count = 0;
  const pending = [rootPid];
  const seen = new Set<number>();
  while (pending.length > 0) {
    const pid = pending.pop();
    if (pid === undefined || seen.has(pid)) continue;
    seen.add(pid);
    count += 1;
    pending.push(...(children.get(pid) ?? []));
  }
  return count;
}

export class NodeResourceProbe implements ResourceProbe {
  private lastCpu = process.cpuUsage();
  private lastWall = process.hrtime.bigint();

  /** Share of one core used since the previous call, 0-100 per core. */
  cpuPercent(): number {
    const cpu = process.cpuUsage();
    const wall = process.hrtime.bigint();
    const cpuMicros = cpu.user - this.lastCpu.user + (cpu.system - this.lastCpu.system);
    const wallMicros = Number(wall - this.lastWall) / 1000;
    this.lastCpu = cpu;
    this.lastWall = wall;
    if (wallMicros <= 0) return 0;
    return (cpuMicros / wallMicros) * 100;
  }

  rssBytes(): number {
    return process.memoryUsage.rss();
  }

  memoryPercent(): number {
    return (process.memoryUsage.rss() / os.totalmem()) * 100;
  }

  async threadCount(): Promise<number> {
    const threads = await readStatusField("self", "Threads");
    if (threads === null) {
      throw new Error("Threads field missing from /proc/self/status");
    }
    return threads;
  }

  async processCount(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(PROC_ROOT);
    } catch {
      // No procfs: only this process is known.
      return 1;
    }

    const pids = entries.map(Number).filter((pid) => Number.isInteger(pid));
    const stats = await Promise.all(
      pids.map(async (pid) => {
        try {
          return { pid, ppid: parseParentPid(await readFile(`${PROC_ROOT}/${pid}/stat`, "utf8")) };
        } catch {
          // Process exited between readdir and read.
          return { pid, ppid: null };
        }
      }),
    );

    const parents = new Map<number, number>();
    for (const { pid, ppid } of stats) {
      if (ppid !== null) parents.set(pid, ppid);
    }
    return countProcessTree(process.pid, parents);
  }
}
