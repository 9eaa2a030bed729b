import { execFile, execFileSync } from "node:child_process";
import { readFileSync, readdirSync } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { promisify } from "node:util";
import type pino from "pino";
import { describeCause } from "../errors.js";

const execFileAsync = promisify(execFile);

export interface ProcessTableEntry {
  pid: number;
  ppid: number;
}

const POSIX_PS_ARGS = ["-A", "-o", "pid=,ppid="];
const WINDOWS_LIST_COMMAND =
  "Get-CimInstance Win32_Process | ForEach-Object { \"$($_.ProcessId) $($_.ParentProcessId)\" }";
const WINDOWS_POWERSHELL_ARGS = ["-NoProfile", "-NonInteractive", "-Command", WINDOWS_LIST_COMMAND];

function processTableCommand(platform: NodeJS.Platform): { file: string; args: string[] } {
  return platform === "win32"
    ? { file: "powershell.exe", args: WINDOWS_POWERSHELL_ARGS }
    : { file: "ps", args: POSIX_PS_ARGS };
}

export function parseProcessTable(output: string): ProcessTableEntry[] {
  const entries: ProcessTableEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = /^\s*(\d+)\s+(\d+)\s*$/.exec(line);
    if (!match) {
      continue;
    }
    const pid = Number.parseInt(match[1] ?? "", 10);
    const ppid = Number.parseInt(match[2] ?? "", 10);
    if (!Number.isInteger(pid) || pid <= 0 || !Number.isInteger(ppid) || ppid < 0) {
      continue;
    }
    entries.push({ pid, ppid });
  }
  return entries;
}

/** Parent pid from the contents of /proc/<pid>/stat; the command name may contain spaces and parens. */
export function parseProcStatParentPid(stat: string): number | null {
  const closing = stat.lastIndexOf(")");
  if (closing === -1) {
    return null;
  }
  const fields = stat.slice(closing + 2).split(" ");
  const ppid = Number.parseInt(fields[1] ?? "", 10);
  return Number.isInteger(ppid) && ppid >= 0 ? ppid : null;
}

function isPidDirectory(name: string): boolean {
  return /^\d+$/.test(name);
}

async function readProcTable(): Promise<ProcessTableEntry[]> {
  const entries: ProcessTableEntry[] = [];
  for (const name of (await readdir("/proc")).filter(isPidDirectory)) {
    try {
      const ppid = parseProcStatParentPid(await readFile(`/proc/${name}/stat`, "utf8"));
      if (ppid !== null) {
        entries.push({ pid: Number.parseInt(name, 10), ppid });
      }
    } catch {
      // exited while listing
    }
  }
  return entries;
}

function readProcTableSync(): ProcessTableEntry[] {
  const entries: ProcessTableEntry[] = [];
  for (const name of readdirSync("/proc").filter(isPidDirectory)) {
    try {
      const ppid = parseProcStatParentPid(readFileSync(`/proc/${name}/stat`, "utf8"));
      if (ppid !== null) {
        entries.push({ pid: Number.parseInt(name, 10), ppid });
      }
    } catch {
      // exited while listing
    }
  }
  return entries;
}

export async function listProcessTable(
  platform: NodeJS.Platform = process.platform
): Promise<ProcessTableEntry[]> {
  const command = processTableCommand(platform);
  try {
    const { stdout } = await execFileAsync(command.file, command.args, {
      encoding: "utf8",
      windowsHide: true,
      maxBuffer: 16 * 1024 * 1024,
    });
    return parseProcessTable(stdout);
  } catch (error) {
    // Minimal Linux images often ship without ps.
    if (platform === "linux") {
      return readProcTable();
    }
    throw error;
  }
}

export function listProcessTableSync(
  platform: NodeJS.Platform = process.platform
): ProcessTableEntry[] {
  const command = processTableCommand(platform);
  try {
    const stdout = execFileSync(command.file, command.args, {
      encoding: "utf8",
      windowsHide: true,
      maxBuffer: 16 * 1024 * 1024,
      stdio: ["ignore", "pipe", "ignore"],
    });
    return parseProcessTable(stdout);
  } catch (error) {
    if (platform === "linux") {
      return readProcTableSync();
    }
    throw error;
  }
}

/** Transitive children of rootPid, deepest first. */
export function findDescendants(rootPid: number, entries: readonly ProcessTableEntry[]): number[] {
  const childrenByParent = new Map<number, number[]>();
  for (const entry of entries) {
    if (entry.pid === entry.ppid) {
      continue;
    }
    const siblings = childrenByParent.get(entry.ppid);
    if (siblings) {
      siblings.push(entry.pid);
    } else {
      childrenByParent.set(entry.ppid, [entry.pid]);
    }
  }

  const ordered: number[] = [];
  const seen = new Set<number>([rootPid]);
  const queue = [rootPid];
  while (queue.length > 0) {
    const parent = queue.shift();
    if (parent === undefined) break;
    for (const child of childrenByParent.get(parent) ?? []) {
      if (seen.has(child)) continue;
      seen.add(child);
      ordered.push(child);
      queue.push(child);
    }
  }
  return ordered.reverse();
}

function readErrnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return readErrnoCode(error) === "EPERM";
  }
}

export function signalProcess(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    if (readErrnoCode(error) === "ESRCH") {
      return false;
    }
    throw error;
  }
}

function killAll(pids: readonly number[], logger: pino.Logger): number[] {
  const killed: number[] = [];
  for (const pid of pids) {
    try {
      if (signalProcess(pid, "SIGKILL")) {
        killed.push(pid);
      }
    } catch (error) {
      logger.debug({ pid, err: describeCause(error) }, "Failed to kill descendant process");
    }
  }
  if (killed.length > 0) {
    logger.debug({ pids: killed }, "Killed descendant processes");
  }
  return killed;
}

export async function killDescendants(
  rootPid: number,
  logger: pino.Logger,
  list: () => Promise<ProcessTableEntry[]> = listProcessTable
): Promise<number[]> {
  let entries: ProcessTableEntry[];
  try {
    entries = await list();
  } catch (error) {
    logger.debug({ pid: rootPid, err: describeCause(error) }, "Failed to read process table");
    return [];
  }
  return killAll(findDescendants(rootPid, entries), logger);
}

export function killDescendantsSync(
  rootPid: number,
  logger: pino.Logger,
  list: () => ProcessTableEntry[] = listProcessTableSync
): number[] {
  let entries: ProcessTableEntry[];
  try {
    entries = list();
  } catch (error) {
    logger.debug({ pid: rootPid, err: describeCause(error) }, "Failed to read process table");
    return [];
  }
  return killAll(findDescendants(rootPid, entries), logger);
}
