import { constants as osConstants } from "node:os";
import type pino from "pino";
import { describeCause } from "../errors.js";
import { createChildLogger } from "../logger.js";

export interface SupervisedProcess {
  readonly pid: number | undefined;
  stop(): Promise<void>;
  /** Synchronous forced kill, for contexts where async work cannot run. */
  terminate(): void;
}

type ShutdownSignal = "SIGINT" | "SIGTERM" | "SIGHUP";

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/** The subset of `process` the registry hooks into. */
export interface ShutdownTarget {
  once(event: "exit", listener: () => void): unknown;
  on(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  listenerCount(event: string): number;
  exit(code?: number): void;
}

export interface ProcessRegistryOptions {
  target?: ShutdownTarget;
  logger?: pino.Logger;
}

/**
 * Live driver processes of this program. The first registration installs
 * the shutdown hooks that stop whatever is still registered.
 */
export class ProcessRegistry {
  private readonly processes = new Set<SupervisedProcess>();
  private readonly target: ShutdownTarget;
  private readonly logger: pino.Logger;
  private hooksInstalled = false;
  private signalShutdown: Promise<void> | null = null;

  constructor(options: ProcessRegistryOptions = {}) {
    this.target = options.target ?? process;
    this.logger = createChildLogger(options.logger, "process-registry");
  }

  get size(): number {
    return this.processes.size;
  }

  get shutdownHooksInstalled(): boolean {
    return this.hooksInstalled;
  }

  has(entry: SupervisedProcess): boolean {
    return this.processes.has(entry);
  }

  register(entry: SupervisedProcess): void {
    this.ensureShutdownHooks();
    this.processes.add(entry);
  }

  unregister(entry: SupervisedProcess): void {
    this.processes.delete(entry);
  }

  async stopAll(): Promise<void> {
    if (this.processes.size === 0) {
      return;
    }
    const entries = Array.from(this.processes);
    this.processes.clear();
    this.logger.info({ count: entries.length }, "Stopping active driver processes");

    await Promise.all(
      entries.map(async (entry) => {
        try {
          await entry.stop();
        } catch (error) {
          this.logger.warn(
            { pid: entry.pid, err: describeCause(error) },
            "Error stopping driver process during shutdown"
          );
        }
      })
    );
  }

  terminateAll(): void {
    const entries = Array.from(this.processes);
    this.processes.clear();
    for (const entry of entries) {
      try {
        entry.terminate();
      } catch (error) {
        this.logger.warn(
          { pid: entry.pid, err: describeCause(error) },
          "Error terminating driver process at exit"
        );
      }
    }
  }

  private ensureShutdownHooks(): void {
    if (this.hooksInstalled) {
      return;
    }
    this.hooksInstalled = true;

    this.target.once("exit", () => {
      this.terminateAll();
    });

    for (const signal of SHUTDOWN_SIGNALS) {
      this.target.on(signal, () => {
        void this.handleSignal(signal);
      });
    }
  }

  private async handleSignal(signal: ShutdownSignal): Promise<void> {
    this.logger.debug({ signal }, "Shutdown signal received, stopping driver processes");
    if (!this.signalShutdown) {
      this.signalShutdown = this.stopAll();
    }
    await this.signalShutdown;
    this.signalShutdown = null;

    // Only take over the exit when nobody else listens for this signal.
    if (this.target.listenerCount(signal) <= 1) {
      this.target.exit(128 + osConstants.signals[signal]);
    }
  }
}

let sharedRegistry: ProcessRegistry | null = null;

export function getProcessRegistry(): ProcessRegistry {
  if (!sharedRegistry) {
    sharedRegistry = new ProcessRegistry();
  }
  return sharedRegistry;
}
