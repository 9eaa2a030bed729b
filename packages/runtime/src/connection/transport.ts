import WebSocket from "ws";

export type TransportCloseEvent = { code: number; reason: string };

/**
 * Duplex text channel capability. Handlers registered right after the
 * factory returns see every event, since sockets report asynchronously.
 */
export type Transport = {
  send: (data: string) => void;
  close: (code?: number, reason?: string) => void;
  terminate: () => void;
  onOpen: (handler: () => void) => () => void;
  onMessage: (handler: (data: string) => void) => () => void;
  onClose: (handler: (event: TransportCloseEvent) => void) => () => void;
  onError: (handler: (error: Error) => void) => () => void;
};

export type TransportFactory = (options: {
  url: string;
  headers?: Record<string, string>;
}) => Transport;

export type TransportKind = "ws" | "native";

export function createWsTransport({
  url,
  headers,
}: {
  url: string;
  headers?: Record<string, string>;
}): Transport {
  const ws = new WebSocket(url, { headers, perMessageDeflate: false });

  return {
    send: (data) => {
      if (ws.readyState !== WebSocket.OPEN) {
        throw new Error(`WebSocket not open (readyState=${ws.readyState})`);
      }
      ws.send(data);
    },
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
    onOpen: (handler) => {
      ws.on("open", handler);
      return () => ws.off("open", handler);
    },
    onMessage: (handler) => {
      const listener = (data: WebSocket.RawData) => {
        const text = decodeMessageData(data);
        if (text !== null) {
          handler(text);
        }
      };
      ws.on("message", listener);
      return () => ws.off("message", listener);
    },
    onClose: (handler) => {
      const listener = (code: number, reason: Buffer) => {
        handler({ code, reason: reason.toString("utf8") });
      };
      ws.on("close", listener);
      return () => ws.off("close", listener);
    },
    onError: (handler) => {
      ws.on("error", handler);
      return () => ws.off("error", handler);
    },
  };
}

type NativeSocketEventType = "open" | "message" | "close" | "error";

type NativeSocketEvent = {
  data?: unknown;
  code?: number;
  reason?: string;
  message?: string;
  error?: unknown;
};

interface NativeWebSocket {
  readonly readyState: number;
  binaryType: string;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  addEventListener(type: NativeSocketEventType, listener: (event: NativeSocketEvent) => void): void;
  removeEventListener(
    type: NativeSocketEventType,
    listener: (event: NativeSocketEvent) => void
  ): void;
}

type NativeWebSocketConstructor = new (url: string) => NativeWebSocket;

const NATIVE_OPEN = 1;

export function hasNativeWebSocket(): boolean {
  return typeof (globalThis as { WebSocket?: unknown }).WebSocket === "function";
}

/** The runtime's global WebSocket (Node 22+, Bun, browsers). Headers are not supported. */
export function createNativeTransport({ url }: { url: string }): Transport {
  const NativeSocket = (globalThis as { WebSocket?: NativeWebSocketConstructor }).WebSocket;
  if (!NativeSocket) {
    throw new Error("WebSocket is not available in this runtime");
  }
  const ws = new NativeSocket(url);
  // Blob is the default and cannot be decoded synchronously.
  ws.binaryType = "arraybuffer";

  const bind = (
    type: NativeSocketEventType,
    listener: (event: NativeSocketEvent) => void
  ): (() => void) => {
    ws.addEventListener(type, listener);
    return () => ws.removeEventListener(type, listener);
  };

  return {
    send: (data) => {
      if (ws.readyState !== NATIVE_OPEN) {
        throw new Error(`WebSocket not open (readyState=${ws.readyState})`);
      }
      ws.send(data);
    },
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.close(),
    onOpen: (handler) => bind("open", () => handler()),
    onMessage: (handler) =>
      bind("message", (event) => {
        const text = decodeMessageData(event.data);
        if (text !== null) {
          handler(text);
        }
      }),
    onClose: (handler) =>
      bind("close", (event) => handler({ code: event.code ?? 0, reason: event.reason ?? "" })),
    onError: (handler) =>
      bind("error", (event) => {
        handler(
          event.error instanceof Error
            ? event.error
            : new Error(event.message && event.message.length > 0 ? event.message : "WebSocket error")
        );
      }),
  };
}

export function transportFactoryFor(kind: TransportKind = "ws"): TransportFactory {
  return kind === "native" ? createNativeTransport : createWsTransport;
}

export function decodeMessageData(data: unknown): string | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  if (Array.isArray(data)) {
    const chunks = data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
    return Buffer.concat(chunks).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
  }
  return null;
}

export function describeTransportClose(event?: TransportCloseEvent): string {
  if (!event) {
    return "Transport closed";
  }
  if (event.reason.trim().length > 0) {
    return event.reason.trim();
  }
  return `Transport closed (code ${event.code})`;
}
