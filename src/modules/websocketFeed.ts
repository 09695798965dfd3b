import WebSocket, { type RawData } from "ws";
import type { ResolvedFeed } from "../adapters/resolveFeed";
import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { FeedsConfig } from "../config/defaults";
import type { ConnectionState } from "../types/feed";
import type { FeedModule } from "../types/module";
import type { QuakeEvent } from "../types/quake";
import { createLogger, errorMessage, type Logger } from "../utils/log";
import { decodeFrame } from "./frames";

export type IngestFn = (sourceName: string, event: QuakeEvent) => void;

export interface FeedSocketClient {
  /** Resolves once the socket is open; rejects when the handshake fails. */
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  onMessage(handler: (text: string) => void): () => void;
  onClose(handler: (reason: string) => void): () => void;
}

export type FeedSocketFactory = (url: string) => FeedSocketClient;

const HANDSHAKE_TIMEOUT_MS = 10_000;

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export class WsFeedClient implements FeedSocketClient {
  private socket: WebSocket | null = null;
  private readonly messageHandlers = new Set<(text: string) => void>();
  private readonly closeHandlers = new Set<(reason: string) => void>();

  constructor(private readonly url: string) {}

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url, { handshakeTimeout: HANDSHAKE_TIMEOUT_MS });
      this.socket = socket;
      let opened = false;

      socket.on("open", () => {
        opened = true;
        resolve();
      });

      socket.on("message", (data, isBinary) => {
        if (isBinary) return;
        const text = frameText(data);
        for (const handler of this.messageHandlers) handler(text);
      });

      socket.on("error", (error) => {
        if (!opened) reject(error);
      });

      socket.on("close", (code, reason) => {
        if (this.socket === socket) this.socket = null;
        const detail = reason.length > 0 ? `code=${code} reason=${reason.toString("utf8")}` : `code=${code}`;
        for (const handler of this.closeHandlers) handler(detail);
      });
    });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.messageHandlers.clear();
    this.closeHandlers.clear();
    if (!socket || socket.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.terminate();
    });
  }

  onMessage(handler: (text: string) => void): () => void {
    this.messageHandlers.add(handler);
    return () => this.messageHandlers.delete(handler);
  }

  onClose(handler: (reason: string) => void): () => void {
    this.closeHandlers.add(handler);
    return () => this.closeHandlers.delete(handler);
  }
}

interface WebSocketFeedConfig {
  url: string;
  reconnect: FeedsConfig["reconnect"];
}

export class WebSocketFeed implements FeedModule {
  readonly transport = "websocket";
  private readonly log: Logger;
  private client: FeedSocketClient | null = null;
  private reconnectTimer?: ReturnType<typeof setTimeout>;
  private running = false;
  private attempts = 0;
  private state: ConnectionState = "disconnected";

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: WebSocketFeedConfig,
    private readonly feed: ResolvedFeed,
    private readonly ingest: IngestFn,
    private readonly createClient: FeedSocketFactory = (url) => new WsFeedClient(url)
  ) {
    this.log = createLogger(registry, `ws:${feed.family}/${feed.sourceType}`);
  }

  get feedId(): string {
    return `${this.feed.family}:${this.feed.sourceType}`;
  }

  get url(): string {
    return this.config.url;
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  /** Consecutive failed connections since the last successful open. */
  get reconnectAttempts(): number {
    return this.attempts;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.attempts = 0;
    this.openConnection();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;

    const client = this.client;
    this.client = null;
    if (client) await client.disconnect();
    this.setState("disconnected", "stopped");
  }

  private openConnection(): void {
    this.connect().catch((error: unknown) => {
      this.log.error(`Connection loop failed: ${errorMessage(error)}`);
    });
  }

  private async connect(): Promise<void> {
    if (!this.running) return;

    const client = this.createClient(this.config.url);
    this.client = client;
    this.setState(this.attempts === 0 ? "connecting" : "reconnecting");

    client.onMessage((text) => this.handleFrame(text));
    client.onClose((reason) => this.handleDrop(client, `closed (${reason})`));

    try {
      await client.connect();
    } catch (error) {
      this.handleDrop(client, `connect failed: ${errorMessage(error)}`);
      return;
    }

    if (this.client !== client) {
      await client.disconnect();
      return;
    }

    this.attempts = 0;
    this.setState("connected");
    this.log.info(`Connected to ${this.config.url}`);
  }

  private handleFrame(text: string): void {
    const frame = decodeFrame(text);
    if (frame.kind === "heartbeat") {
      this.log.debug("Heartbeat");
      return;
    }
    if (frame.kind === "invalid") {
      this.log.warn(`Unparseable frame skipped: ${frame.error}`);
      return;
    }
    if (frame.kind === "error") {
      this.log.warn(`Feed reported an error: ${frame.message}`);
      return;
    }

    const events = this.feed.adapter.parseAll(frame.data);
    if (events.length === 0) {
      this.log.debug("Frame carried no usable event");
      return;
    }
    for (const event of events) {
      this.log.info(`[${event.source}] ${event.type}`);
      this.ingest(event.source, event);
    }
  }

  private handleDrop(client: FeedSocketClient, reason: string): void {
    // Errors and closes of the same socket both land here; only the first counts.
    if (!this.running || this.client !== client) return;
    this.client = null;
    this.log.warn(`Disconnected: ${reason}`);

    this.attempts += 1;
    const { maxAttempts, stepSeconds, maxDelaySeconds } = this.config.reconnect;
    if (maxAttempts > 0 && this.attempts >= maxAttempts) {
      this.log.warn(`Reconnect failed ${maxAttempts} times, pausing`);
      this.setState("paused", reason);
      return;
    }

    const delaySeconds = Math.min(this.attempts * stepSeconds, maxDelaySeconds);
    this.setState("disconnected", `retry in ${delaySeconds}s (attempt ${this.attempts})`);
    this.log.debug(`Reconnecting in ${delaySeconds}s (attempt ${this.attempts})`);

    if (this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.openConnection();
    }, delaySeconds * 1000);
  }

  private setState(state: ConnectionState, message?: string): void {
    this.state = state;
    this.registry.emit("feed.connection", {
      feedId: this.feedId,
      url: this.config.url,
      transport: this.transport,
      state,
      ts: Date.now(),
      message
    });
  }
}
