import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ResolvedFeed } from "../adapters/resolveFeed";
import { ModuleRegistry } from "../boot/moduleRegistry";
import { quakeEvent } from "../testing/fixtures";
import type { ConnectionState } from "../types/feed";
import type { QuakeEvent } from "../types/quake";
import { type FeedSocketClient, WebSocketFeed } from "./websocketFeed";

class FakeSocketClient implements FeedSocketClient {
  readonly messageHandlers = new Set<(text: string) => void>();
  readonly closeHandlers = new Set<(reason: string) => void>();
  disconnected = false;

  constructor(private readonly failConnect: boolean) {}

  async connect(): Promise<void> {
    if (this.failConnect) throw new Error("ECONNREFUSED");
  }

  async disconnect(): Promise<void> {
    this.disconnected = true;
  }

  onMessage(handler: (text: string) => void): () => void {
    this.messageHandlers.add(handler);
    return () => this.messageHandlers.delete(handler);
  }

  onClose(handler: (reason: string) => void): () => void {
    this.closeHandlers.add(handler);
    return () => this.closeHandlers.delete(handler);
  }

  receive(text: string): void {
    for (const handler of this.messageHandlers) handler(text);
  }

  drop(reason: string): void {
    for (const handler of this.closeHandlers) handler(reason);
  }
}

const FEED_URL = "wss://feeds.example.test/all";

describe("WebSocketFeed", () => {
  let registry: ModuleRegistry;
  let clients: FakeSocketClient[];
  let failures: boolean[];
  let parsed: unknown[];
  let ingested: Array<[string, QuakeEvent]>;
  let states: ConnectionState[];

  const resolved = (): ResolvedFeed => ({
    family: "fanstudio",
    sourceType: "all",
    adapter: {
      family: "fanstudio",
      parse: () => null,
      parseAll: (raw) => {
        parsed.push(raw);
        return [quakeEvent({ source: "cenc" })];
      }
    }
  });

  const build = (maxAttempts = -1): WebSocketFeed =>
    new WebSocketFeed(
      registry,
      { url: FEED_URL, reconnect: { maxAttempts, stepSeconds: 2, maxDelaySeconds: 30 } },
      resolved(),
      (source, event) => ingested.push([source, event]),
      () => {
        const client = new FakeSocketClient(failures.shift() ?? false);
        clients.push(client);
        return client;
      }
    );

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new ModuleRegistry();
    clients = [];
    failures = [];
    parsed = [];
    ingested = [];
    states = [];
    registry.on("feed.connection", (evt) => states.push(evt.state));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should connect and hand parsed frames to ingestion", async () => {
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(feed.connectionState).toBe("connected");
    clients[0]?.receive('{"type":"update","source":"cenc"}');

    expect(parsed).toEqual([{ type: "update", source: "cenc" }]);
    expect(ingested.map(([source]) => source)).toEqual(["cenc"]);
    expect(states).toEqual(["connecting", "connected"]);
  });

  it("should clean control characters before giving up on a frame", async () => {
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);

    clients[0]?.receive('{"placeName":"四川\u0002宜宾"}');
    clients[0]?.receive("{{{");

    expect(parsed).toEqual([{ placeName: "四川宜宾" }]);
  });

  it("should skip heartbeats", async () => {
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);

    clients[0]?.receive('{"type":"heartbeat"}');

    expect(parsed).toEqual([]);
    expect(ingested).toEqual([]);
  });

  it("should back off by two seconds per failed attempt", async () => {
    failures = [true, true];
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(feed.reconnectAttempts).toBe(1);

    await vi.advanceTimersByTimeAsync(1999);
    expect(clients).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(clients).toHaveLength(2);
    expect(feed.reconnectAttempts).toBe(2);

    await vi.advanceTimersByTimeAsync(3999);
    expect(clients).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(clients).toHaveLength(3);
    expect(feed.connectionState).toBe("connected");
    expect(feed.reconnectAttempts).toBe(0);
  });

  it("should cap the backoff at thirty seconds", async () => {
    failures = Array.from({ length: 20 }, () => true);
    const feed = build();
    feed.start();
    // 2 + 4 + ... + 28 seconds covers the first fourteen retries.
    await vi.advanceTimersByTimeAsync(210_000);
    expect(clients).toHaveLength(15);
    expect(feed.reconnectAttempts).toBe(15);

    await vi.advanceTimersByTimeAsync(29_999);
    expect(clients).toHaveLength(15);
    await vi.advanceTimersByTimeAsync(1);
    expect(clients).toHaveLength(16);
  });

  it("should restart the backoff after a successful open", async () => {
    failures = [true];
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(2000);
    expect(feed.connectionState).toBe("connected");

    clients[1]?.drop("code=1006");
    expect(feed.reconnectAttempts).toBe(1);
    await vi.advanceTimersByTimeAsync(2000);
    expect(clients).toHaveLength(3);
  });

  it("should pause once the attempt limit is reached", async () => {
    failures = [true, true, true];
    const feed = build(2);
    feed.start();
    await vi.advanceTimersByTimeAsync(2000);

    expect(clients).toHaveLength(2);
    expect(feed.connectionState).toBe("paused");

    await vi.advanceTimersByTimeAsync(60_000);
    expect(clients).toHaveLength(2);
    expect(states).toEqual(["connecting", "disconnected", "reconnecting", "paused"]);
  });

  it("should count a socket that errors and closes as one failure", async () => {
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);

    clients[0]?.drop("code=1006");
    clients[0]?.drop("code=1006");

    expect(feed.reconnectAttempts).toBe(1);
  });

  it("should disconnect and stay down after stop", async () => {
    const feed = build();
    feed.start();
    await vi.advanceTimersByTimeAsync(0);

    await feed.stop();
    clients[0]?.drop("code=1000");
    await vi.advanceTimersByTimeAsync(60_000);

    expect(clients[0]?.disconnected).toBe(true);
    expect(clients).toHaveLength(1);
    expect(feed.connectionState).toBe("disconnected");
  });
});
