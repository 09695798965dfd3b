import { createHash } from "node:crypto";
import type { ResolvedFeed } from "../adapters/resolveFeed";
import { isWolfxEqlist } from "../adapters/wolfx";
import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { FeedsConfig } from "../config/defaults";
import type { ConnectionState } from "../types/feed";
import type { FeedModule } from "../types/module";
import { createLogger, errorMessage, type Logger } from "../utils/log";
import { decodeFrame } from "./frames";
import type { IngestFn } from "./websocketFeed";

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

interface HttpPollingFeedConfig {
  url: string;
  polling: FeedsConfig["polling"];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpPollingFeed implements FeedModule {
  readonly transport = "http";
  private readonly log: Logger;
  private timer?: ReturnType<typeof setTimeout>;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private state: ConnectionState = "disconnected";
  private lastDigest: string | null = null;
  private lastError = { message: "", at: 0 };

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: HttpPollingFeedConfig,
    private readonly feed: ResolvedFeed,
    private readonly ingest: IngestFn,
    private readonly fetchImpl: FetchFn = (url, init) => fetch(url, init),
    private readonly now: () => number = Date.now
  ) {
    this.log = createLogger(registry, `http:${feed.family}/${feed.sourceType}`);
  }

  get feedId(): string {
    return `${this.feed.family}:${this.feed.sourceType}`;
  }

  get url(): string {
    return this.config.url;
  }

  get intervalMs(): number {
    const { intervalMs, eqlistIntervalMs } = this.config.polling;
    return this.feed.family === "wolfx" && isWolfxEqlist(this.feed.sourceType) ? eqlistIntervalMs : intervalMs;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.setState("connecting");
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    if (this.inFlight) await this.inFlight;
    this.setState("disconnected", "stopped");
  }

  /** One fetch cycle with retries. Never rejects. */
  async pollOnce(): Promise<void> {
    const { attempts, retryDelayMs } = this.config.polling;
    let body: string | null = null;
    let failure = "";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        body = await this.fetchText();
        break;
      } catch (error) {
        failure = errorMessage(error);
        if (attempt < attempts) await sleep(retryDelayMs);
      }
    }

    if (body === null) {
      this.reportFailure(`${this.config.url} unreachable after ${attempts} attempt(s): ${failure}`);
      return;
    }

    if (this.state !== "connected") this.setState("connected");

    const digest = createHash("md5").update(body).digest("hex");
    if (digest === this.lastDigest) return;
    this.lastDigest = digest;

    const frame = decodeFrame(body);
    if (frame.kind === "invalid") {
      this.log.warn(`Unparseable response skipped: ${frame.error}`);
      return;
    }
    if (frame.kind === "heartbeat") return;
    if (frame.kind === "error") {
      this.log.warn(`Feed reported an error: ${frame.message}`);
      return;
    }

    const events = this.feed.adapter.parseAll(frame.data);
    if (events.length === 0) {
      this.log.debug("Response carried no usable event");
      return;
    }
    for (const event of events) {
      this.log.info(`[${event.source}] ${event.type}`);
      this.ingest(event.source, event);
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.pollOnce().finally(() => {
        this.inFlight = null;
        if (this.running) this.schedule(this.intervalMs);
      });
    }, delayMs);
  }

  private async fetchText(): Promise<string> {
    const { timeoutMs } = this.config.polling;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchImpl(this.config.url, { signal: controller.signal });
      if (!response.ok) throw new Error(`HTTP ${response.status}`);
      return await response.text();
    } catch (error) {
      if (controller.signal.aborted) throw new Error(`timed out after ${timeoutMs}ms`);
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private reportFailure(message: string): void {
    const at = this.now();
    const repeated =
      message === this.lastError.message && at - this.lastError.at < this.config.polling.errorLogIntervalMs;
    if (repeated) {
      this.log.debug(message);
    } else {
      this.log.error(message);
      this.lastError = { message, at };
    }
    if (this.state !== "disconnected") this.setState("disconnected", message);
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
