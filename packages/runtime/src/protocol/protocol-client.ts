import type pino from "pino";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "../config.js";
import { Connection, type ConnectionOptions } from "../connection/connection.js";
import {
  ClosedError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  describeCause,
  toError,
} from "../errors.js";
import { createChildLogger } from "../logger.js";
import {
  encodeCommand,
  parseIncomingMessage,
  type CommandParams,
  type EventMessage,
  type ResponseMessage,
} from "./messages.js";

export type ProtocolEvent = {
  method: string;
  params: CommandParams;
};

export type EventHandler = (event: ProtocolEvent) => void | Promise<void>;

export interface SendOptions {
  timeoutMs?: number;
}

export interface ProtocolClientOptions extends Omit<ConnectionOptions, "onClose"> {
  commandTimeoutMs?: number;
  /**
   * Consulted when the connection drops, to find the error pending commands
   * should fail with. Falls back to the ConnectionError.
   */
  resolveDisconnectCause?: (error: ConnectionError) => Promise<Error> | Error;
}

type PendingRequest = {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

export class ProtocolClient {
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 1;
  private eventHandler: EventHandler | null = null;
  private terminalError: Error | null = null;
  private closePromise: Promise<void> | null = null;
  private discarded = 0;

  private constructor(
    private readonly connection: Connection,
    private readonly options: ProtocolClientOptions,
    private readonly logger: pino.Logger
  ) {}

  static async connect(url: string, options: ProtocolClientOptions = {}): Promise<ProtocolClient> {
    const logger = createChildLogger(options.logger, "protocol-client");
    let client: ProtocolClient | null = null;

    const connection = await Connection.open(
      url,
      (message) => client?.handleMessage(message),
      {
        transportFactory: options.transportFactory,
        headers: options.headers,
        connectTimeoutMs: options.connectTimeoutMs,
        closeTimeoutMs: options.closeTimeoutMs,
        logger: options.logger,
        onClose: (error) => client?.handleConnectionClosed(error),
      }
    );
    client = new ProtocolClient(connection, options, logger);
    return client;
  }

  get url(): string {
    return this.connection.url;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Responses that arrived for no pending command. */
  get discardedResponses(): number {
    return this.discarded;
  }

  isConnected(): boolean {
    return this.terminalError === null && !this.connection.isClosed();
  }

  send(method: string, params: CommandParams = {}, options: SendOptions = {}): Promise<unknown> {
    if (this.terminalError) {
      return Promise.reject(this.terminalError);
    }

    const id = this.nextId++;
    const timeoutMs = options.timeoutMs ?? this.options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.take(id)) {
          this.logger.debug({ id, method, timeoutMs }, "Command timed out");
          reject(new TimeoutError(method, timeoutMs));
        }
      }, timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });

      try {
        this.connection.send(encodeCommand({ id, method, params }));
      } catch (error) {
        const request = this.take(id);
        request?.reject(toError(error));
        return;
      }
      this.logger.trace({ id, method }, "Command sent");
    });
  }

  /** Sets the single event sink, replacing any previous one. */
  onEvent(handler: EventHandler): () => void {
    this.eventHandler = handler;
    return () => {
      if (this.eventHandler === handler) {
        this.eventHandler = null;
      }
    };
  }

  close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    this.terminalError = new ClosedError();
    this.failAll(this.terminalError);
    this.closePromise = this.connection.close();
    return this.closePromise;
  }

  /** Fails every pending command with cause and closes the connection. */
  abort(cause: Error): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    this.logger.debug({ err: cause.message }, "Aborting client");
    this.terminalError = cause;
    this.failAll(cause);
    this.closePromise = this.connection.close();
    return this.closePromise;
  }

  private handleMessage(text: string): void {
    const message = parseIncomingMessage(text);
    switch (message.kind) {
      case "invalid":
        this.logger.warn({ reason: message.reason }, "Dropping unparseable message");
        return;
      case "event":
        this.dispatchEvent(message);
        return;
      case "response":
        this.settleResponse(message);
        return;
    }
  }

  private settleResponse(response: ResponseMessage): void {
    const request = this.take(response.id);
    if (!request) {
      this.discarded += 1;
      if (response.id < this.nextId) {
        this.logger.debug({ id: response.id }, "Discarding response for settled command");
      } else {
        this.logger.warn({ id: response.id }, "Discarding response with unknown id");
      }
      return;
    }

    if (response.ok) {
      request.resolve(response.result);
      return;
    }
    request.reject(
      new ProtocolError({
        code: response.error.code,
        message: response.error.message,
        stacktrace: response.error.stacktrace,
        method: request.method,
      })
    );
  }

  private dispatchEvent(message: EventMessage): void {
    const handler = this.eventHandler;
    if (!handler) {
      this.logger.trace({ method: message.method }, "No event handler, dropping event");
      return;
    }
    const event: ProtocolEvent = { method: message.method, params: message.params };
    Promise.resolve()
      .then(() => handler(event))
      .catch((error: unknown) => {
        this.logger.warn({ method: event.method, err: describeCause(error) }, "Event handler failed");
      });
  }

  private handleConnectionClosed(error: ConnectionError | null): void {
    if (!error || this.terminalError) {
      return;
    }
    this.terminalError = error;
    void this.failAfterDisconnect(error);
  }

  private async failAfterDisconnect(error: ConnectionError): Promise<void> {
    let cause: Error = error;
    const resolveCause = this.options.resolveDisconnectCause;
    if (resolveCause) {
      try {
        cause = await resolveCause(error);
      } catch (resolveError) {
        this.logger.warn({ err: describeCause(resolveError) }, "Failed to resolve disconnect cause");
      }
    }
    if (this.terminalError === error) {
      this.terminalError = cause;
    }
    this.failAll(cause);
  }

  private failAll(error: Error): void {
    const requests = Array.from(this.pending.values());
    for (const request of requests) {
      clearTimeout(request.timer);
    }
    this.pending.clear();
    if (requests.length > 0) {
      this.logger.debug({ count: requests.length, err: error.message }, "Failing pending commands");
    }
    for (const request of requests) {
      request.reject(error);
    }
  }

  /** Removes and returns the pending entry; the first caller wins. */
  private take(id: number): PendingRequest | undefined {
    const request = this.pending.get(id);
    if (!request) {
      return undefined;
    }
    this.pending.delete(id);
    clearTimeout(request.timer);
    return request;
  }
}
