import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { WsSubscriptionClient, reconnectDelayMs } from "./client";
import type { WebSocketError } from "./error";
import { FakeWebSocket } from "../../test/fake_web_socket";
import { TEST_CONFIG } from "../../test/helpers";

vi.mock("ws", async () => {
  const { FakeWebSocket } = await import("../../test/fake_web_socket");
  return { default: FakeWebSocket };
});

const priceSchema = z.object({ mark_px: z.number() }).passthrough();

function opened(client: WsSubscriptionClient): FakeWebSocket {
  expect(client.connectionState()).toBe("Connecting");
  const socket = FakeWebSocket.latest();
  socket.serverOpen();
  return socket;
}

describe("reconnectDelayMs", () => {
  it("grows by 1.5x from one second and caps", () => {
    expect(reconnectDelayMs(0)).toBe(1000);
    expect(reconnectDelayMs(1)).toBe(1500);
    expect(reconnectDelayMs(2)).toBe(2250);
    expect(reconnectDelayMs(20)).toBe(60_000);
    expect(reconnectDelayMs(3, 2000)).toBe(2000);
  });
});

describe("WsSubscriptionClient", () => {
  let errors: WebSocketError[];
  let client: WsSubscriptionClient;

  beforeEach(() => {
    FakeWebSocket.reset();
    errors = [];
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    client = new WsSubscriptionClient(TEST_CONFIG, { onError: (e) => errors.push(e) });
  });

  afterEach(() => {
    client.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("opens lazily on the first subscription", () => {
    expect(FakeWebSocket.instances).toHaveLength(0);
    expect(client.readyState()).toBe(3);

    client.subscribe("a", priceSchema, () => {});
    client.subscribe("b", priceSchema, () => {});

    expect(FakeWebSocket.instances).toHaveLength(1);
    expect(FakeWebSocket.latest().url).toBe("ws://trading.test/ws");
    expect(FakeWebSocket.latest().protocols).toBeUndefined();
  });

  it("announces the API key as a subprotocol", () => {
    const keyed = new WsSubscriptionClient(TEST_CONFIG, { apiKey: "test-key" });
    keyed.subscribe("a", priceSchema, () => {});
    expect(FakeWebSocket.latest().protocols).toEqual(["decibel", "test-key"]);
    keyed.close();
  });

  it("replays every tracked topic once the socket opens", () => {
    client.subscribe("a", priceSchema, () => {});
    client.subscribe("b", priceSchema, () => {});
    const socket = opened(client);

    expect(client.connectionState()).toBe("Open");
    expect(client.readyState()).toBe(1);
    expect(socket.sentMessages()).toEqual([
      { method: "subscribe", topic: "a" },
      { method: "subscribe", topic: "b" },
    ]);
  });

  it("sends one subscribe and one unsubscribe per topic", async () => {
    vi.useFakeTimers();
    const first = vi.fn();
    const second = vi.fn();

    const subA = client.subscribe("prices:0xM", priceSchema, first);
    const socket = opened(client);
    const subB = client.subscribe("prices:0xM", priceSchema, second);
    expect(socket.sentMessages()).toEqual([{ method: "subscribe", topic: "prices:0xM" }]);
    expect(client.listenerCount("prices:0xM")).toBe(2);

    subA.unsubscribe();
    expect(client.topics()).toEqual(["prices:0xM"]);
    socket.serverMessage({ topic: "prices:0xM", mark_px: 7 });
    await client.idle();
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith({ mark_px: 7 });

    subB.unsubscribe();
    subB.unsubscribe();
    expect(socket.sentMessages()).toEqual([
      { method: "subscribe", topic: "prices:0xM" },
      { method: "unsubscribe", topic: "prices:0xM" },
    ]);

    vi.advanceTimersByTime(499);
    expect(socket.readyState).toBe(FakeWebSocket.OPEN);
    vi.advanceTimersByTime(1);
    expect(socket.readyState).toBe(FakeWebSocket.CLOSED);
    expect(client.connectionState()).toBe("Closed");
    expect(client.readyState()).toBe(3);
  });

  it("keeps the socket when a subscription arrives within the grace period", () => {
    vi.useFakeTimers();
    const sub = client.subscribe("a", priceSchema, () => {});
    const socket = opened(client);
    sub.unsubscribe();
    vi.advanceTimersByTime(200);
    client.subscribe("b", priceSchema, () => {});
    vi.advanceTimersByTime(1000);

    expect(socket.readyState).toBe(FakeWebSocket.OPEN);
    expect(FakeWebSocket.instances).toHaveLength(1);
    expect(socket.sentMessages()).toEqual([
      { method: "subscribe", topic: "a" },
      { method: "unsubscribe", topic: "a" },
      { method: "subscribe", topic: "b" },
    ]);
  });

  it("dispatches only to listeners of the message's topic", async () => {
    const prices = vi.fn();
    const other = vi.fn();
    client.subscribe("prices:0xM", priceSchema, prices);
    client.subscribe("prices:0xN", priceSchema, other);
    const socket = opened(client);

    socket.serverMessage({ topic: "prices:0xM", mark_px: 100 });
    await client.idle();

    expect(prices).toHaveBeenCalledTimes(1);
    expect(prices.mock.calls[0][0].mark_px).toBe(100);
    expect(other).not.toHaveBeenCalled();
  });

  it("ignores acknowledgements and reports protocol errors without closing", async () => {
    const listener = vi.fn();
    client.subscribe("a", priceSchema, listener);
    const socket = opened(client);

    socket.serverMessage({ success: true, topic: "a" });
    socket.serverMessage({ mark_px: 1 });
    socket.serverMessage("{oops");
    socket.serverBinary(new Uint8Array([1, 2]));
    socket.serverMessage({ topic: "a", mark_px: 2 });
    await client.idle();

    expect(errors.map((e) => e.variant)).toEqual(["MessageParseError", "MessageParseError", "Protocol"]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ mark_px: 2 });
    expect(socket.readyState).toBe(FakeWebSocket.OPEN);
  });

  it("isolates schema failures and listener exceptions", async () => {
    const strict = vi.fn();
    const throwing = vi.fn(() => {
      throw new Error("listener bug");
    });
    const lenient = vi.fn();
    client.subscribe("a", z.object({ size: z.number() }), strict);
    client.subscribe("a", priceSchema, throwing);
    client.subscribe("a", priceSchema, lenient);
    const socket = opened(client);

    socket.serverMessage({ topic: "a", mark_px: 3 });
    await client.idle();

    expect(strict).not.toHaveBeenCalled();
    expect(throwing).toHaveBeenCalledTimes(1);
    expect(lenient).toHaveBeenCalledWith({ mark_px: 3 });
    expect(errors).toHaveLength(1);
    expect(errors[0].variant).toBe("Validation");
    expect(errors[0].message).toBe("Invalid payload for a: size: Required");
  });

  it("delivers messages in order, awaiting async listeners", async () => {
    const seen: number[] = [];
    client.subscribe("a", priceSchema, async ({ mark_px }) => {
      await new Promise((resolve) => setTimeout(resolve, mark_px === 1 ? 10 : 0));
      seen.push(mark_px);
    });
    const socket = opened(client);

    socket.serverMessage({ topic: "a", mark_px: 1 });
    socket.serverMessage({ topic: "a", mark_px: 2 });
    await client.idle();

    expect(seen).toEqual([1, 2]);
  });

  it("gives up on a listener after its timeout and moves on", async () => {
    const fast = new WsSubscriptionClient(TEST_CONFIG, { listenerTimeoutMs: 20, onError: (e) => errors.push(e) });
    const after = vi.fn();
    fast.subscribe("a", priceSchema, () => new Promise<void>(() => {}));
    fast.subscribe("a", priceSchema, after);
    const socket = FakeWebSocket.latest();
    socket.serverOpen();

    socket.serverMessage({ topic: "a", mark_px: 1 });
    await fast.idle();

    expect(after).toHaveBeenCalledTimes(1);
    expect(errors.map((e) => e.variant)).toEqual(["ListenerTimeout"]);
    fast.close();
  });

  it("revives big integers before validation", async () => {
    const listener = vi.fn();
    client.subscribe("a", z.object({ order_id: z.bigint() }), listener);
    const socket = opened(client);

    socket.serverMessage('{"topic":"a","order_id":{"$bigint":"340282366920938463463374607431768211455"}}');
    await client.idle();

    expect(listener).toHaveBeenCalledWith({ order_id: 340282366920938463463374607431768211455n });
  });

  it("cycles a topic on reset without touching listeners", () => {
    client.subscribe("depth:0x1:1", priceSchema, () => {});
    const socket = opened(client);
    client.reset("depth:0x1:1");
    client.reset("unknown");

    expect(socket.sentMessages()).toEqual([
      { method: "subscribe", topic: "depth:0x1:1" },
      { method: "unsubscribe", topic: "depth:0x1:1" },
      { method: "subscribe", topic: "depth:0x1:1" },
    ]);
    expect(client.listenerCount("depth:0x1:1")).toBe(1);
  });

  it("reconnects with backoff and replays topics", () => {
    vi.useFakeTimers();
    client.subscribe("a", priceSchema, () => {});
    opened(client).serverDrop();

    expect(client.connectionState()).toBe("Reconnecting");
    vi.advanceTimersByTime(999);
    expect(FakeWebSocket.instances).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(FakeWebSocket.instances).toHaveLength(2);

    // fails before opening: next wait is 1.5s
    FakeWebSocket.latest().serverDrop();
    vi.advanceTimersByTime(1499);
    expect(FakeWebSocket.instances).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(FakeWebSocket.instances).toHaveLength(3);

    const third = opened(client);
    expect(third.sentMessages()).toEqual([{ method: "subscribe", topic: "a" }]);

    // attempt counter was reset by the successful open
    third.serverDrop();
    vi.advanceTimersByTime(1000);
    expect(FakeWebSocket.instances).toHaveLength(4);
  });

  it("abandons a pending reconnect once nothing is subscribed", () => {
    vi.useFakeTimers();
    const sub = client.subscribe("a", priceSchema, () => {});
    opened(client).serverDrop();
    sub.unsubscribe();

    vi.advanceTimersByTime(5000);
    expect(FakeWebSocket.instances).toHaveLength(1);
    expect(client.connectionState()).toBe("Closed");
  });

  it("closes idempotently and cancels timers", () => {
    vi.useFakeTimers();
    client.subscribe("a", priceSchema, () => {});
    const socket = opened(client);

    client.close();
    client.close();

    expect(socket.readyState).toBe(FakeWebSocket.CLOSED);
    expect(client.topics()).toEqual([]);
    expect(client.connectionState()).toBe("Closed");
    vi.advanceTimersByTime(120_000);
    expect(FakeWebSocket.instances).toHaveLength(1);
  });
});
