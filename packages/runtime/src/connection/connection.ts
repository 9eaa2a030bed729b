import type pino from "pino";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "../config.js";
import { ConnectionClosedError, ConnectionError, describeCause } from "../errors.js";
import { createChildLogger } from "../logger.js";
import {
  createWsTransport,
  describeTransportClose,
  type Transport,
  type TransportCloseEvent,
  type TransportFactory,
} from "./transport.js";

export type ConnectionState = "connecting" | "open" | "closing" | "closed";

export const DEFAULT_CLOSE_TIMEOUT_MS = 2000;

export interface ConnectionOptions {
  transportFactory?: TransportFactory;
  headers?: Record<string, string>;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
  /**
   * Called once when the connection ends: with null after close(), with a
   * ConnectionError when the peer or the network ended it.
   */
  onClose?: (error: ConnectionError | null) => void;
  logger?: pino.Logger;
}

/**
 * One WebSocket to the driver. Inbound text frames go to the message handler
 * in arrival order, outbound sends are written in call order.
 */
export class Connection {
  readonly url: string;

  private currentState: ConnectionState = "connecting";
  private readonly transport: Transport;
  private readonly logger: pino.Logger;
  private lastError: Error | null = null;
  private failure: ConnectionError | null = null;
  private closePromise: Promise<void> | null = null;
  private closeWaiter: (() => void) | null = null;
  private openWaiter: {
    resolve: () => void;
    reject: (error: ConnectionError) => void;
    timer: ReturnType<typeof setTimeout>;
  } | null = null;

  private constructor(
    url: string,
    private readonly handleMessage: (message: string) => void,
    private readonly options: ConnectionOptions
  ) {
    this.url = url;
    this.logger = createChildLogger(options.logger, "connection");
    const factory = options.transportFactory ?? createWsTransport;
    this.transport = factory({ url, headers: options.headers });

    // Listeners stay attached for the socket's lifetime: ws reports an error
    // after terminate() on a socket that is still connecting.
    this.transport.onOpen(() => this.handleOpen());
    this.transport.onMessage((data) => this.handleInbound(data));
    this.transport.onError((error) => this.handleError(error));
    this.transport.onClose((event) => this.handleClose(event));
  }

  /** Resolves once the socket is open; rejects with ConnectionError on failure or timeout. */
  static open(
    url: string,
    onMessage: (message: string) => void,
    options: ConnectionOptions = {}
  ): Promise<Connection> {
    let connection: Connection;
    try {
      connection = new Connection(url, onMessage, options);
    } catch (error) {
      return Promise.reject(new ConnectionError(url, error));
    }
    return connection.waitUntilOpen(options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Why the connection ended, when the peer or the network ended it. */
  get closeError(): ConnectionError | null {
    return this.failure;
  }

  isClosed(): boolean {
    return this.currentState === "closed";
  }

  send(message: string): void {
    if (this.currentState !== "open") {
      throw new ConnectionClosedError(this.url);
    }
    this.transport.send(message);
  }

  close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    if (this.currentState === "closed") {
      this.closePromise = Promise.resolve();
      return this.closePromise;
    }

    this.currentState = "closing";
    this.closePromise = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.closeWaiter = null;
        this.logger.debug({ url: this.url }, "Close handshake timed out, terminating socket");
        this.transport.terminate();
        this.finish(null);
        resolve();
      }, this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS);

      this.closeWaiter = () => {
        clearTimeout(timer);
        this.closeWaiter = null;
        resolve();
      };

      try {
        this.transport.close(1000, "Client closing");
      } catch (error) {
        this.logger.debug({ err: describeCause(error) }, "Transport close failed, terminating");
        this.transport.terminate();
        this.finish(null);
      }
    });
    return this.closePromise;
  }

  private waitUntilOpen(timeoutMs: number): Promise<Connection> {
    return new Promise<Connection>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new ConnectionError(this.url, new Error(`Timed out after ${timeoutMs}ms`)));
        this.transport.terminate();
      }, timeoutMs);
      this.openWaiter = {
        resolve: () => resolve(this),
        reject,
        timer,
      };
    });
  }

  private handleOpen(): void {
    if (this.currentState !== "connecting") {
      return;
    }
    this.currentState = "open";
    this.logger.debug({ url: this.url }, "Connected");
    const waiter = this.openWaiter;
    this.openWaiter = null;
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve();
    }
  }

  private handleInbound(data: string): void {
    if (this.currentState !== "open") {
      return;
    }
    try {
      this.handleMessage(data);
    } catch (error) {
      this.logger.warn({ err: describeCause(error) }, "Message handler threw");
    }
  }

  private handleError(error: Error): void {
    this.lastError = error;
    if (this.currentState === "connecting") {
      this.fail(new ConnectionError(this.url, error));
      this.transport.terminate();
      return;
    }
    this.logger.debug({ url: this.url, err: error.message }, "Transport error");
  }

  private handleClose(event: TransportCloseEvent): void {
    if (this.currentState === "closed") {
      return;
    }
    if (this.currentState === "closing") {
      this.finish(null);
      return;
    }
    const cause = this.lastError ?? new Error(describeTransportClose(event));
    this.fail(new ConnectionError(this.url, cause));
  }

  private fail(error: ConnectionError): void {
    if (this.currentState === "closed") {
      return;
    }
    const wasConnecting = this.currentState === "connecting";
    this.failure = error;
    this.finish(error);
    if (wasConnecting) {
      this.logger.debug({ url: this.url, err: error.message }, "Connect failed");
    } else {
      this.logger.warn({ url: this.url, err: error.message }, "Connection lost");
    }
  }

  private finish(error: ConnectionError | null): void {
    if (this.currentState === "closed") {
      return;
    }
    const wasConnecting = this.currentState === "connecting";
    this.currentState = "closed";

    const openWaiter = this.openWaiter;
    this.openWaiter = null;
    if (openWaiter) {
      clearTimeout(openWaiter.timer);
      openWaiter.reject(error ?? new ConnectionError(this.url, new Error("Closed while connecting")));
    }
    this.closeWaiter?.();

    if (wasConnecting) {
      return;
    }
    try {
      this.options.onClose?.(error);
    } catch (listenerError) {
      this.logger.warn({ err: describeCause(listenerError) }, "Close listener threw");
    }
  }
}
