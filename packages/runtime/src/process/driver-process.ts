import { spawn, type ChildProcessByStdio } from "node:child_process";
import readline from "node:readline";
import type { Readable } from "node:stream";
import type pino from "pino";
import { resolveDriverBinary, type BundledPackageLocator } from "../binary-resolver.js";
import { DEFAULT_START_TIMEOUT_MS, DEFAULT_STOP_TIMEOUT_MS } from "../config.js";
import {
  ProcessCrashedError,
  StartTimeoutError,
  describeCause,
} from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { PlatformInfo } from "../platform.js";
import {
  getProcessRegistry,
  type ProcessRegistry,
  type SupervisedProcess,
} from "./process-registry.js";
import { killDescendants, killDescendantsSync } from "./process-table.js";

export type DriverProcessState = "starting" | "running" | "stopping" | "stopped" | "crashed";

export const ANNOUNCEMENT_PATTERN = /Server listening on ws:\/\/localhost:(\d+)/;

const MAX_OUTPUT_CHARS = 256 * 1024;
const STREAM_DRAIN_GRACE_MS = 250;

export interface DriverStartOptions {
  headless?: boolean;
  port?: number;
  binaryPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  startTimeoutMs?: number;
  stopTimeoutMs?: number;
  registry?: ProcessRegistry;
  platform?: PlatformInfo;
  locateBundledPackage?: BundledPackageLocator;
  logger?: pino.Logger;
}

type DriverChild = ChildProcessByStdio<null, Readable, Readable>;

type ExitInfo = { code: number | null; signal: NodeJS.Signals | null };

export function buildServeArgs(options: { headless?: boolean; port?: number }): string[] {
  const args = ["serve"];
  if (options.port !== undefined && options.port > 0) {
    args.push("--port", String(options.port));
  }
  if (options.headless) {
    args.push("--headless");
  }
  return args;
}

export function parseAnnouncedPort(line: string): number | null {
  const match = ANNOUNCEMENT_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const port = Number.parseInt(match[1] ?? "", 10);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : null;
}

/** Script drivers are run with the current Node binary instead of relying on a shebang. */
export function buildLaunchCommand(
  binaryPath: string,
  args: string[]
): { command: string; args: string[] } {
  if (/\.(?:c|m)?js$/i.test(binaryPath)) {
    return { command: process.execPath, args: [binaryPath, ...args] };
  }
  return { command: binaryPath, args };
}

export const TRUNCATED_OUTPUT_MARKER = "[truncated]\n";

/** Combined driver output, keeping the most recent maxChars characters. */
export class OutputBuffer {
  private text = "";
  private truncated = false;

  constructor(private readonly maxChars: number = MAX_OUTPUT_CHARS) {}

  append(line: string): void {
    this.text += `${line}\n`;
    if (this.text.length > this.maxChars) {
      this.text = this.text.slice(-this.maxChars);
      this.truncated = true;
    }
  }

  toString(): string {
    return this.truncated ? `${TRUNCATED_OUTPUT_MARKER}${this.text}` : this.text;
  }
}

type StartWaiter = {
  onReady: (port: number) => void;
  onFailure: (error: Error) => void;
};

/**
 * A supervised driver subprocess. Ready once the first endpoint announcement
 * is read from its combined output.
 */
export class DriverProcess implements SupervisedProcess {
  readonly binaryPath: string;
  readonly args: readonly string[];

  private currentState: DriverProcessState = "starting";
  private stopped = false;
  private announcedPort: number | null = null;
  private exitInfo: ExitInfo | null = null;
  private crashError: ProcessCrashedError | null = null;
  private startWaiter: StartWaiter | null = null;
  private stopPromise: Promise<void> | null = null;
  private readonly captured = new OutputBuffer();
  private readonly crashListeners = new Set<(error: ProcessCrashedError) => void>();
  private readonly exitWaiters = new Set<() => void>();
  private openStreams = 2;
  private readonly streamWaiters = new Set<() => void>();

  private constructor(
    private readonly child: DriverChild,
    params: { binaryPath: string; args: string[] },
    private readonly registry: ProcessRegistry,
    private readonly stopTimeoutMs: number,
    private readonly logger: pino.Logger
  ) {
    this.binaryPath = params.binaryPath;
    this.args = params.args;

    for (const stream of [child.stdout, child.stderr]) {
      const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
      rl.on("line", (line) => this.handleLine(line));
      rl.on("close", () => this.handleStreamClosed());
    }

    child.on("error", (error) => this.handleSpawnError(error));
    child.on("exit", (code, signal) => {
      void this.handleExit({ code, signal });
    });
  }

  static async start(options: DriverStartOptions = {}): Promise<DriverProcess> {
    const logger = createChildLogger(options.logger, "driver-process");
    const binaryPath = await resolveDriverBinary({
      explicitPath: options.binaryPath,
      env: options.env,
      cwd: options.cwd,
      platform: options.platform,
      locateBundledPackage: options.locateBundledPackage,
      logger: options.logger,
    });

    const args = buildServeArgs(options);
    const launch = buildLaunchCommand(binaryPath, args);
    logger.debug({ binaryPath, args }, "Starting driver");

    const child = spawn(launch.command, launch.args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const driver = new DriverProcess(
      child,
      { binaryPath, args },
      options.registry ?? getProcessRegistry(),
      options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS,
      logger
    );

    const port = await driver.waitUntilReady(options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS);
    driver.registry.register(driver);
    logger.info({ port, pid: driver.pid }, "Driver started");
    return driver;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get port(): number {
    if (this.announcedPort === null) {
      throw new Error("Driver has not announced a port");
    }
    return this.announcedPort;
  }

  get state(): DriverProcessState {
    return this.currentState;
  }

  get output(): string {
    return this.captured.toString();
  }

  get endpointUrl(): string {
    return `ws://localhost:${this.port}`;
  }

  isRunning(): boolean {
    return this.isAlive() && !this.stopped;
  }

  /**
   * Called once if the driver exits without stop(). Subscribing after such an
   * exit still notifies, on a microtask.
   */
  onExit(listener: (error: ProcessCrashedError) => void): () => void {
    const crashed = this.crashError;
    if (crashed) {
      queueMicrotask(() => listener(crashed));
      return () => {};
    }
    this.crashListeners.add(listener);
    return () => {
      this.crashListeners.delete(listener);
    };
  }

  /** Resolves with the crash error if the driver exits on its own within timeoutMs, otherwise null. */
  async waitForExit(timeoutMs: number): Promise<ProcessCrashedError | null> {
    await this.waitForExitEvent(timeoutMs);
    if (this.exitInfo) {
      await this.waitForStreams(STREAM_DRAIN_GRACE_MS);
    }
    return this.crashError;
  }

  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }
    return this.stopPromise;
  }

  terminate(): void {
    this.stopped = true;
    this.registry.unregister(this);
    if (!this.isAlive() || this.child.pid === undefined) {
      return;
    }
    killDescendantsSync(this.child.pid, this.logger);
    this.child.kill("SIGKILL");
    this.transition("stopped");
  }

  private async performStop(): Promise<void> {
    this.stopped = true;
    this.registry.unregister(this);

    const pid = this.child.pid;
    if (!this.isAlive() || pid === undefined) {
      this.transition("stopped");
      return;
    }

    this.transition("stopping");
    this.logger.debug({ pid, port: this.announcedPort }, "Stopping driver");

    await killDescendants(pid, this.logger);
    this.child.kill("SIGTERM");

    if (!(await this.waitForExitEvent(this.stopTimeoutMs))) {
      this.logger.debug({ pid }, "Driver ignored SIGTERM, killing");
      this.child.kill("SIGKILL");
      await this.waitForExitEvent(this.stopTimeoutMs);
    }
    this.transition("stopped");
  }

  private waitUntilReady(timeoutMs: number): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      let settled = false;
      const finish = (action: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.startWaiter = null;
        action();
      };

      const timer = setTimeout(() => {
        finish(() => {
          const output = this.output;
          this.logger.warn({ pid: this.pid, timeoutMs }, "Driver did not announce its endpoint");
          this.killAfterFailedStart().then(
            () => reject(new StartTimeoutError(timeoutMs, output)),
            (error: unknown) => {
              this.logger.warn({ err: describeCause(error) }, "Failed to kill driver after start timeout");
              reject(new StartTimeoutError(timeoutMs, output));
            }
          );
        });
      }, timeoutMs);

      this.startWaiter = {
        onReady: (port) => finish(() => resolve(port)),
        onFailure: (error) => finish(() => reject(error)),
      };
    });
  }

  private async killAfterFailedStart(): Promise<void> {
    this.stopped = true;
    const pid = this.child.pid;
    if (!this.isAlive() || pid === undefined) {
      return;
    }
    await killDescendants(pid, this.logger);
    this.child.kill("SIGKILL");
    await this.waitForExitEvent(this.stopTimeoutMs);
    this.transition("stopped");
  }

  private handleLine(line: string): void {
    this.captured.append(line);
    this.logger.trace({ line }, "driver output");

    if (this.currentState !== "starting" || this.announcedPort !== null || this.stopped) {
      return;
    }
    const port = parseAnnouncedPort(line);
    if (port === null) {
      return;
    }
    this.announcedPort = port;
    this.transition("running");
    this.startWaiter?.onReady(port);
  }

  private handleSpawnError(error: Error): void {
    if (this.currentState === "starting" && !this.exitInfo) {
      this.transition("crashed");
      this.crashError = new ProcessCrashedError({
        exitCode: null,
        output: this.output,
        cause: error,
      });
      this.startWaiter?.onFailure(this.crashError);
      return;
    }
    this.logger.warn({ pid: this.pid, err: error.message }, "Driver process error");
  }

  private async handleExit(info: ExitInfo): Promise<void> {
    this.exitInfo = info;
    for (const waiter of this.exitWaiters) {
      waiter();
    }
    this.exitWaiters.clear();

    if (this.stopped) {
      return;
    }

    // Output written just before exit may still be in the pipes.
    await this.waitForStreams(STREAM_DRAIN_GRACE_MS);

    const wasStarting = this.currentState === "starting";
    if (!this.transition("crashed")) {
      return;
    }
    this.registry.unregister(this);
    this.crashError = new ProcessCrashedError({
      exitCode: info.code,
      signal: info.signal,
      output: this.output,
    });

    if (wasStarting) {
      this.startWaiter?.onFailure(this.crashError);
      return;
    }

    this.logger.warn(
      { pid: this.pid, exitCode: info.code, signal: info.signal },
      "Driver exited unexpectedly"
    );
    const listeners = Array.from(this.crashListeners);
    this.crashListeners.clear();
    for (const listener of listeners) {
      try {
        listener(this.crashError);
      } catch (error) {
        this.logger.warn({ err: describeCause(error) }, "Driver exit listener threw");
      }
    }
  }

  private handleStreamClosed(): void {
    this.openStreams -= 1;
    if (this.openStreams > 0) {
      return;
    }
    for (const waiter of this.streamWaiters) {
      waiter();
    }
    this.streamWaiters.clear();
  }

  private isAlive(): boolean {
    return (
      this.child.pid !== undefined &&
      this.exitInfo === null &&
      this.child.exitCode === null &&
      this.child.signalCode === null
    );
  }

  /** Moves to the next state; terminal states are entered at most once. */
  private transition(next: DriverProcessState): boolean {
    const current = this.currentState;
    if (current === "stopped" || current === "crashed") {
      return false;
    }
    if (current === next) {
      return false;
    }
    this.currentState = next;
    this.logger.trace({ from: current, to: next }, "Driver state changed");
    return true;
  }

  private waitForExitEvent(timeoutMs: number): Promise<boolean> {
    if (this.exitInfo || this.child.pid === undefined) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters.delete(onExit);
        resolve(false);
      }, timeoutMs);
      this.exitWaiters.add(onExit);
    });
  }

  private waitForStreams(timeoutMs: number): Promise<void> {
    if (this.openStreams <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const onClosed = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.streamWaiters.delete(onClosed);
        resolve();
      }, timeoutMs);
      this.streamWaiters.add(onClosed);
    });
  }
}
