import { readFileSync } from "node:fs";
import { chmod } from "node:fs/promises";
import { createServer } from "node:net";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { ProcessRegistry, type ShutdownTarget } from "../process/process-registry.js";
import { isProcessAlive } from "../process/process-table.js";

export const FAKE_DRIVER_PATH = fileURLToPath(new URL("./fixtures/fake-driver.mjs", import.meta.url));

export type FakeDriverMode =
  | "serve"
  | "ignore-sigterm"
  | "spawn-child-on-start"
  | "exit-after"
  | "silent"
  | "crash-on-start"
  | "announce-external";

export const silentLogger = pino({ level: "silent" });

export async function makeFakeDriverExecutable(): Promise<void> {
  await chmod(FAKE_DRIVER_PATH, 0o755);
}

export function fakeDriverEnv(
  mode: FakeDriverMode,
  extra: Record<string, string> = {}
): NodeJS.ProcessEnv {
  return { ...process.env, FAKE_DRIVER_MODE: mode, ...extra };
}

/** Records hook installation instead of touching the real process. */
export class FakeShutdownTarget implements ShutdownTarget {
  readonly listeners = new Map<string, Array<() => void>>();
  readonly exitCodes: Array<number | undefined> = [];
  extraListeners = 0;

  once(event: "exit", listener: () => void): this {
    this.add(event, listener);
    return this;
  }

  on(event: "SIGINT" | "SIGTERM" | "SIGHUP", listener: (signal: NodeJS.Signals) => void): this {
    this.add(event, () => listener(event));
    return this;
  }

  listenerCount(event: string): number {
    return (this.listeners.get(event)?.length ?? 0) + this.extraListeners;
  }

  exit(code?: number): void {
    this.exitCodes.push(code);
  }

  emit(event: "exit" | NodeJS.Signals): void {
    for (const listener of this.listeners.get(event) ?? []) {
      listener();
    }
  }

  private add(event: string, listener: () => void): void {
    const existing = this.listeners.get(event) ?? [];
    existing.push(listener);
    this.listeners.set(event, existing);
  }
}

export function createTestRegistry(): { registry: ProcessRegistry; target: FakeShutdownTarget } {
  const target = new FakeShutdownTarget();
  return { registry: new ProcessRegistry({ target, logger: silentLogger }), target };
}

/** A loopback port that was free a moment ago. */
export function getFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once("error", reject);
    server.listen(0, () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      server.close(() => resolve(port));
    });
  });
}

/** Dead, or a zombie nobody has reaped yet. */
export function isProcessGone(pid: number): boolean {
  if (!isProcessAlive(pid)) {
    return true;
  }
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, "utf8");
    return stat.slice(stat.lastIndexOf(")") + 2).startsWith("Z");
  } catch {
    return true;
  }
}
