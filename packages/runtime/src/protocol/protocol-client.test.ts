import { describe, expect, test, vi } from "vitest";
import { ClosedError, ConnectionError, ProtocolError, TimeoutError } from "../errors.js";
import { silentLogger } from "../test-utils/fake-driver.js";
import { createMemoryTransportFactory } from "../test-utils/memory-transport.js";
import { ProtocolClient, type ProtocolClientOptions, type ProtocolEvent } from "./protocol-client.js";

async function connectClient(options: ProtocolClientOptions = {}) {
  const { factory, transports } = createMemoryTransportFactory();
  const client = await ProtocolClient.connect("ws://memory.test", {
    transportFactory: factory,
    logger: silentLogger,
    ...options,
  });
  return { client, transport: transports[0] };
}

describe("ProtocolClient commands", () => {
  test("numbers commands from 1 and defaults params", async () => {
    const { client, transport } = await connectClient();

    const first = client.send("session.status");
    const second = client.send("browsingContext.navigate", { url: "about:blank" });

    expect(transport.sentMessages()).toEqual([
      { id: 1, method: "session.status", params: {} },
      { id: 2, method: "browsingContext.navigate", params: { url: "about:blank" } },
    ]);
    expect(client.pendingCount).toBe(2);

    transport.simulateMessage({ id: 1, type: "success", result: { ready: true } });
    transport.simulateMessage({ id: 2 });

    await expect(first).resolves.toEqual({ ready: true });
    await expect(second).resolves.toEqual({});
    expect(client.pendingCount).toBe(0);
  });

  test("settles out-of-order responses by id", async () => {
    const { client, transport } = await connectClient();

    const first = client.send("first");
    const second = client.send("second");
    transport.simulateMessage({ id: 2, type: "success", result: { n: 2 } });
    transport.simulateMessage({ id: 1, type: "success", result: { n: 1 } });

    await expect(Promise.all([first, second])).resolves.toEqual([{ n: 1 }, { n: 2 }]);
  });

  test("error responses reject with ProtocolError", async () => {
    const { client, transport } = await connectClient();

    const pending = client.send("browsingContext.locateNodes", { selector: "#missing" });
    transport.simulateMessage({
      id: 1,
      type: "error",
      error: "no such element",
      message: "Element not found",
      stacktrace: "at locate",
    });

    const error = await pending.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      code: "no such element",
      remoteMessage: "Element not found",
      stacktrace: "at locate",
      method: "browsingContext.locateNodes",
      message: "no such element: Element not found",
    });
    expect(error instanceof ProtocolError && error.is("no such element")).toBe(true);
  });

  test("a timeout fails only its own command and the late response is discarded", async () => {
    const { client, transport } = await connectClient();

    const slow = client.send("script.evaluate", {}, { timeoutMs: 20 });
    const other = client.send("session.status");

    const error = await slow.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      method: "script.evaluate",
      timeoutMs: 20,
      message: "Command script.evaluate timed out after 20ms",
    });
    expect(client.pendingCount).toBe(1);

    transport.simulateMessage({ id: 1, type: "success", result: { late: true } });
    transport.simulateMessage({ id: 2, type: "success", result: { ok: true } });

    await expect(other).resolves.toEqual({ ok: true });
    expect(client.discardedResponses).toBe(1);
  });

  test("uses the client's command timeout when none is given", async () => {
    const { client } = await connectClient({ commandTimeoutMs: 15 });

    await expect(client.send("never.answered")).rejects.toMatchObject({
      name: "TimeoutError",
      timeoutMs: 15,
    });
  });

  test("unknown ids and malformed frames are dropped", async () => {
    const { client, transport } = await connectClient();
    const pending = client.send("session.status");

    transport.simulateMessage({ id: 99, type: "success" });
    transport.simulateMessage("{not json");
    transport.simulateMessage({ id: 1, type: "success", result: { ok: true } });

    await expect(pending).resolves.toEqual({ ok: true });
    expect(client.discardedResponses).toBe(1);
  });

  test("a response with an unrecognized type still settles its command", async () => {
    const { client, transport } = await connectClient();
    const first = client.send("x", {}, { timeoutMs: 200 });
    const second = client.send("y", {}, { timeoutMs: 200 });

    transport.simulateMessage({ id: 1, type: "result", result: { ok: 1 } });
    transport.simulateMessage({ id: "2", result: { ok: 2 } });

    await expect(first).resolves.toEqual({ ok: 1 });
    await expect(second).resolves.toEqual({ ok: 2 });
    expect(client.pendingCount).toBe(0);
  });

  test("a failed write rejects the command and leaves nothing pending", async () => {
    const { client, transport } = await connectClient();
    transport.failSends = true;

    await expect(client.send("session.status")).rejects.toThrow("send failed");
    expect(client.pendingCount).toBe(0);
  });
});

describe("ProtocolClient events", () => {
  test("dispatches events after the frame is handled", async () => {
    const { client, transport } = await connectClient();
    const events: ProtocolEvent[] = [];
    client.onEvent((event) => {
      events.push(event);
    });

    transport.simulateMessage({ method: "log.entryAdded", params: { text: "hello" } });
    transport.simulateMessage({ method: "browsingContext.load" });
    expect(events).toEqual([]);

    await vi.waitFor(() => {
      expect(events).toEqual([
        { method: "log.entryAdded", params: { text: "hello" } },
        { method: "browsingContext.load", params: {} },
      ]);
    });
  });

  test("a later handler replaces the earlier one and unsubscribe detaches it", async () => {
    const { client, transport } = await connectClient();
    const first: string[] = [];
    const second: string[] = [];

    client.onEvent((event) => {
      first.push(event.method);
    });
    const unsubscribe = client.onEvent((event) => {
      second.push(event.method);
    });
    transport.simulateMessage({ method: "one" });
    await vi.waitFor(() => {
      expect(second).toEqual(["one"]);
    });

    unsubscribe();
    transport.simulateMessage({ method: "two" });
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(first).toEqual([]);
    expect(second).toEqual(["one"]);
  });

  test("failing handlers do not disturb command processing", async () => {
    const { client, transport } = await connectClient();
    client.onEvent((event) => {
      if (event.method === "reject") return Promise.reject(new Error("async handler failure"));
      throw new Error("sync handler failure");
    });

    const pending = client.send("session.status");
    transport.simulateMessage({ method: "throw" });
    transport.simulateMessage({ method: "reject" });
    transport.simulateMessage({ id: 1, type: "success", result: { ok: true } });

    await expect(pending).resolves.toEqual({ ok: true });
  });
});

describe("ProtocolClient teardown", () => {
  test("close fails pending commands with ClosedError and is idempotent", async () => {
    const { client, transport } = await connectClient();
    const pending = client.send("script.evaluate").catch((caught: unknown) => caught);

    const closing = client.close();
    expect(client.close()).toBe(closing);
    await closing;

    expect(await pending).toBeInstanceOf(ClosedError);
    await expect(client.send("late")).rejects.toThrow("Client closed");
    expect(transport.closeCalls).toHaveLength(1);
    expect(client.isConnected()).toBe(false);
  });

  test("abort fails pending and later commands with the cause", async () => {
    const { client } = await connectClient();
    const cause = new Error("driver crashed");
    const pending = client.send("script.evaluate").catch((caught: unknown) => caught);

    await client.abort(cause);

    expect(await pending).toBe(cause);
    await expect(client.send("late")).rejects.toBe(cause);
  });

  test("a dropped connection fails every pending command with ConnectionError", async () => {
    const { client, transport } = await connectClient();
    const pending = [client.send("a"), client.send("b"), client.send("c")];

    transport.simulateClose(1006, "");

    const results = await Promise.allSettled(pending);
    for (const result of results) {
      expect(result.status).toBe("rejected");
      expect(result.status === "rejected" && result.reason).toBeInstanceOf(ConnectionError);
    }
    expect(client.pendingCount).toBe(0);
    expect(client.isConnected()).toBe(false);
  });

  test("resolveDisconnectCause supplies the error pending commands fail with", async () => {
    const crash = new Error("driver exited with exit code 3");
    const resolveDisconnectCause = vi.fn(async (_error: ConnectionError) => crash);
    const { client, transport } = await connectClient({ resolveDisconnectCause });
    const pending = ["a", "b"].map((method) =>
      client.send(method).catch((caught: unknown) => caught)
    );

    transport.simulateClose(1006, "");

    expect(await Promise.all(pending)).toEqual([crash, crash]);
    await expect(client.send("c")).rejects.toBe(crash);
    expect(resolveDisconnectCause).toHaveBeenCalledTimes(1);
    expect(resolveDisconnectCause.mock.calls[0]?.[0]).toBeInstanceOf(ConnectionError);
  });
});
