import type {
  Transport,
  TransportCloseEvent,
  TransportFactory,
} from "../connection/transport.js";

/** In-memory transport driven by the test. */
export class MemoryTransport implements Transport {
  readonly url: string;
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  terminated = false;
  /** When false, close() waits for the test to call simulateClose(). */
  closeHandshake = true;
  failSends = false;

  private readonly openHandlers = new Set<() => void>();
  private readonly messageHandlers = new Set<(data: string) => void>();
  private readonly closeHandlers = new Set<(event: TransportCloseEvent) => void>();
  private readonly errorHandlers = new Set<(error: Error) => void>();
  private closed = false;

  constructor(url: string) {
    this.url = url;
  }

  send(data: string): void {
    if (this.failSends) {
      throw new Error("send failed");
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    if (this.closeHandshake) {
      queueMicrotask(() => this.simulateClose(code ?? 1000, reason ?? ""));
    }
  }

  terminate(): void {
    this.terminated = true;
    queueMicrotask(() => this.simulateClose(1006, ""));
  }

  onOpen(handler: () => void): () => void {
    this.openHandlers.add(handler);
    return () => this.openHandlers.delete(handler);
  }

  onMessage(handler: (data: string) => void): () => void {
    this.messageHandlers.add(handler);
    return () => this.messageHandlers.delete(handler);
  }

  onClose(handler: (event: TransportCloseEvent) => void): () => void {
    this.closeHandlers.add(handler);
    return () => this.closeHandlers.delete(handler);
  }

  onError(handler: (error: Error) => void): () => void {
    this.errorHandlers.add(handler);
    return () => this.errorHandlers.delete(handler);
  }

  /** Parsed commands written so far. */
  sentMessages(): unknown[] {
    return this.sent.map((text): unknown => JSON.parse(text));
  }

  simulateOpen(): void {
    for (const handler of this.openHandlers) handler();
  }

  simulateMessage(message: string | object): void {
    const text = typeof message === "string" ? message : JSON.stringify(message);
    for (const handler of this.messageHandlers) handler(text);
  }

  simulateError(error: Error): void {
    for (const handler of this.errorHandlers) handler(error);
  }

  simulateClose(code = 1006, reason = ""): void {
    if (this.closed) return;
    this.closed = true;
    for (const handler of this.closeHandlers) handler({ code, reason });
  }
}

export function createMemoryTransportFactory(options: { autoOpen?: boolean } = {}): {
  factory: TransportFactory;
  transports: MemoryTransport[];
} {
  const transports: MemoryTransport[] = [];
  const factory: TransportFactory = ({ url }) => {
    const transport = new MemoryTransport(url);
    transports.push(transport);
    if (options.autoOpen ?? true) {
      queueMicrotask(() => transport.simulateOpen());
    }
    return transport;
  };
  return { factory, transports };
}
