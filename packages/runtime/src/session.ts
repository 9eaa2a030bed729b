import type pino from "pino";
import type { BundledPackageLocator } from "./binary-resolver.js";
import { loadRuntimeConfig } from "./config.js";
import {
  transportFactoryFor,
  type TransportFactory,
  type TransportKind,
} from "./connection/transport.js";
import { describeCause } from "./errors.js";
import { createChildLogger } from "./logger.js";
import type { PlatformInfo } from "./platform.js";
import { DriverProcess } from "./process/driver-process.js";
import type { ProcessRegistry } from "./process/process-registry.js";
import type { CommandParams } from "./protocol/messages.js";
import {
  ProtocolClient,
  type EventHandler,
  type SendOptions,
} from "./protocol/protocol-client.js";

/** How long a dropped connection waits for the driver's exit status. */
export const DISCONNECT_EXIT_GRACE_MS = 1000;

export interface ConnectSessionOptions {
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  headers?: Record<string, string>;
  /** Ignored when transportFactory is given. */
  transport?: TransportKind;
  transportFactory?: TransportFactory;
  env?: NodeJS.ProcessEnv;
  logger?: pino.Logger;
}

export interface LaunchSessionOptions extends Omit<ConnectSessionOptions, "headers"> {
  headless?: boolean;
  port?: number;
  binaryPath?: string;
  cwd?: string;
  startTimeoutMs?: number;
  stopTimeoutMs?: number;
  registry?: ProcessRegistry;
  platform?: PlatformInfo;
  locateBundledPackage?: BundledPackageLocator;
}

/** A protocol client, plus the driver process behind it when this program started one. */
export class Session {
  private closePromise: Promise<void> | null = null;

  constructor(
    readonly client: ProtocolClient,
    readonly driver: DriverProcess | null,
    private readonly logger: pino.Logger
  ) {}

  get url(): string {
    return this.client.url;
  }

  send(method: string, params?: CommandParams, options?: SendOptions): Promise<unknown> {
    return this.client.send(method, params, options);
  }

  onEvent(handler: EventHandler): () => void {
    return this.client.onEvent(handler);
  }

  /** Closes the client, then stops the driver even if closing the client failed. */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.performClose();
    }
    return this.closePromise;
  }

  private async performClose(): Promise<void> {
    let clientError: unknown = null;
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn({ err: describeCause(error) }, "Failed to close protocol client");
      clientError = error;
    }
    if (this.driver) {
      await this.driver.stop();
    }
    if (clientError !== null) {
      throw clientError;
    }
  }
}

/** Starts a driver and connects to it. The driver is stopped if connecting fails. */
export async function launchSession(options: LaunchSessionOptions = {}): Promise<Session> {
  const env = options.env ?? process.env;
  const config = loadRuntimeConfig(env);
  const logger = createChildLogger(options.logger, "session");

  const driver = await DriverProcess.start({
    headless: options.headless ?? config.headless,
    port: options.port,
    binaryPath: options.binaryPath,
    env,
    cwd: options.cwd,
    startTimeoutMs: options.startTimeoutMs ?? config.startTimeoutMs,
    stopTimeoutMs: options.stopTimeoutMs ?? config.stopTimeoutMs,
    registry: options.registry,
    platform: options.platform,
    locateBundledPackage: options.locateBundledPackage,
    logger: options.logger,
  });

  const client = await ProtocolClient.connect(driver.endpointUrl, {
    connectTimeoutMs: options.connectTimeoutMs ?? config.connectTimeoutMs,
    commandTimeoutMs: options.commandTimeoutMs ?? config.commandTimeoutMs,
    transportFactory: options.transportFactory ?? transportFactoryFor(options.transport),
    logger: options.logger,
    resolveDisconnectCause: async (error) =>
      (await driver.waitForExit(DISCONNECT_EXIT_GRACE_MS)) ?? error,
  }).catch(async (error: unknown) => {
    logger.warn({ url: driver.endpointUrl, err: describeCause(error) }, "Connect failed, stopping driver");
    await driver.stop();
    throw error;
  });

  driver.onExit((crash) => {
    void client.abort(crash);
  });
  logger.debug({ url: client.url, pid: driver.pid }, "Session ready");
  return new Session(client, driver, logger);
}

/** Attaches to a driver someone else started. */
export async function connectSession(
  url: string,
  options: ConnectSessionOptions = {}
): Promise<Session> {
  const config = loadRuntimeConfig(options.env ?? process.env);
  const client = await ProtocolClient.connect(url, {
    connectTimeoutMs: options.connectTimeoutMs ?? config.connectTimeoutMs,
    commandTimeoutMs: options.commandTimeoutMs ?? config.commandTimeoutMs,
    headers: options.headers,
    transportFactory: options.transportFactory ?? transportFactoryFor(options.transport),
    logger: options.logger,
  });
  return new Session(client, null, createChildLogger(options.logger, "session"));
}
