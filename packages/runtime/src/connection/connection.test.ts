import { afterEach, describe, expect, test, vi } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { ConnectionClosedError, ConnectionError } from "../errors.js";
import { getFreePort, silentLogger } from "../test-utils/fake-driver.js";
import { createMemoryTransportFactory } from "../test-utils/memory-transport.js";
import { Connection } from "./connection.js";

describe("Connection over an in-memory transport", () => {
  test("delivers inbound messages in arrival order and writes sends", async () => {
    const { factory, transports } = createMemoryTransportFactory();
    const received: string[] = [];

    const connection = await Connection.open("ws://memory.test", (message) => received.push(message), {
      transportFactory: factory,
      logger: silentLogger,
    });

    expect(connection.state).toBe("open");
    transports[0].simulateMessage("first");
    transports[0].simulateMessage("second");
    connection.send("outbound");

    expect(received).toEqual(["first", "second"]);
    expect(transports[0].sent).toEqual(["outbound"]);
  });

  test("rejects with ConnectionError when the transport fails before opening", async () => {
    const { factory, transports } = createMemoryTransportFactory({ autoOpen: false });

    const opening = Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      logger: silentLogger,
    });
    transports[0].simulateError(new Error("ECONNREFUSED"));

    const error = await opening.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      url: "ws://memory.test",
      message: "Failed to connect to ws://memory.test: ECONNREFUSED",
    });
    expect(transports[0].terminated).toBe(true);
  });

  test("rejects with ConnectionError when the transport factory throws", async () => {
    const error = await Connection.open("not a url", () => {}, {
      transportFactory: () => {
        throw new Error("Invalid URL");
      },
      logger: silentLogger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: "Failed to connect to not a url: Invalid URL" });
  });

  test("times out while connecting", async () => {
    const { factory } = createMemoryTransportFactory({ autoOpen: false });

    const error = await Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      connectTimeoutMs: 20,
      logger: silentLogger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: "Failed to connect to ws://memory.test: Timed out after 20ms",
    });
  });

  test("send throws ConnectionClosedError once closed", async () => {
    const { factory } = createMemoryTransportFactory();
    const connection = await Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      logger: silentLogger,
    });

    await connection.close();

    expect(connection.isClosed()).toBe(true);
    expect(() => connection.send("late")).toThrow(ConnectionClosedError);
  });

  test("close is idempotent and reports a clean close", async () => {
    const { factory, transports } = createMemoryTransportFactory();
    const closes: Array<ConnectionError | null> = [];
    const connection = await Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      onClose: (error) => closes.push(error),
      logger: silentLogger,
    });

    const first = connection.close();
    const second = connection.close();
    expect(second).toBe(first);
    await first;

    expect(transports[0].closeCalls).toEqual([{ code: 1000, reason: "Client closing" }]);
    expect(closes).toEqual([null]);
    expect(connection.closeError).toBeNull();
  });

  test("terminates the transport when the close handshake never completes", async () => {
    const { factory, transports } = createMemoryTransportFactory();
    const connection = await Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      closeTimeoutMs: 20,
      logger: silentLogger,
    });
    transports[0].closeHandshake = false;

    await connection.close();

    expect(transports[0].terminated).toBe(true);
    expect(connection.state).toBe("closed");
  });

  test("a peer drop closes the connection with a ConnectionError", async () => {
    const { factory, transports } = createMemoryTransportFactory();
    const closes: Array<ConnectionError | null> = [];
    const connection = await Connection.open("ws://memory.test", () => {}, {
      transportFactory: factory,
      onClose: (error) => closes.push(error),
      logger: silentLogger,
    });

    transports[0].simulateClose(1006, "");

    expect(connection.state).toBe("closed");
    expect(connection.closeError?.message).toBe(
      "Failed to connect to ws://memory.test: Transport closed (code 1006)"
    );
    expect(closes).toEqual([connection.closeError]);
  });

  test("a failing message handler does not stop delivery", async () => {
    const { factory, transports } = createMemoryTransportFactory();
    const received: string[] = [];
    await Connection.open(
      "ws://memory.test",
      (message) => {
        if (message === "bad") throw new Error("handler failure");
        received.push(message);
      },
      { transportFactory: factory, logger: silentLogger }
    );

    transports[0].simulateMessage("bad");
    transports[0].simulateMessage("good");

    expect(received).toEqual(["good"]);
  });
});

describe("Connection over ws", () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      for (const client of current.clients) client.terminate();
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  function startServer(onConnection: (socket: WebSocket) => void): Promise<number> {
    return new Promise((resolve) => {
      const wss = new WebSocketServer({ port: 0 });
      server = wss;
      wss.on("connection", onConnection);
      wss.on("listening", () => {
        const address = wss.address();
        resolve(typeof address === "object" && address !== null ? address.port : 0);
      });
    });
  }

  test("round-trips text frames with a loopback server", async () => {
    const port = await startServer((socket) => {
      socket.on("message", (data) => socket.send(`echo:${data.toString()}`));
    });
    const received: string[] = [];

    const connection = await Connection.open(`ws://127.0.0.1:${port}`, (message) => received.push(message), {
      logger: silentLogger,
    });
    connection.send("ping");

    await vi.waitFor(() => {
      expect(received).toEqual(["echo:ping"]);
    });
    await connection.close();
    expect(connection.isClosed()).toBe(true);
  });

  test("refused connections reject with ConnectionError", async () => {
    const port = await getFreePort();

    const error = await Connection.open(`ws://127.0.0.1:${port}`, () => {}, {
      logger: silentLogger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ url: `ws://127.0.0.1:${port}` });
  });

  test("a server-side close surfaces as closeError", async () => {
    const serverSockets: WebSocket[] = [];
    const port = await startServer((socket) => {
      serverSockets.push(socket);
    });
    const closes: Array<ConnectionError | null> = [];
    const connection = await Connection.open(`ws://127.0.0.1:${port}`, () => {}, {
      onClose: (error) => closes.push(error),
      logger: silentLogger,
    });

    await vi.waitFor(() => {
      expect(serverSockets).toHaveLength(1);
    });
    serverSockets[0].close(1011, "driver shutting down");

    await vi.waitFor(() => {
      expect(connection.isClosed()).toBe(true);
    });
    expect(closes).toHaveLength(1);
    expect(connection.closeError?.message).toBe(
      `Failed to connect to ws://127.0.0.1:${port}: driver shutting down`
    );
  });
});
