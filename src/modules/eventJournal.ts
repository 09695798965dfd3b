import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { EventKey, EventMap } from "../types/events";
import type { SystemModule } from "../types/module";
import { createLogger, errorMessage, type Logger } from "../utils/log";

interface EventJournalConfig {
  enabled: boolean;
  path: string;
  flushMs: number;
}

interface JournalRow<K extends EventKey = EventKey> {
  event: K;
  ts: number;
  payload: EventMap[K];
}

const JOURNALED: readonly EventKey[] = [
  "feed.event",
  "display.decision",
  "admission.rejected",
  "queue.dropped",
  "log"
];

/** Append-only NDJSON diagnostics. Never read back. */
export class EventJournal implements SystemModule {
  private readonly log: Logger;
  private readonly buffer: JournalRow[] = [];
  private flushTimer?: ReturnType<typeof setInterval>;
  private unsubs: Array<() => void> = [];
  private writing: Promise<void> = Promise.resolve();

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: EventJournalConfig
  ) {
    this.log = createLogger(registry, "journal");
  }

  async start(): Promise<void> {
    if (!this.config.enabled) return;

    await mkdir(dirname(this.config.path), { recursive: true });
    await writeFile(this.config.path, "");

    for (const event of JOURNALED) {
      const unsub = this.registry.on(event, (payload) => {
        this.buffer.push({ event, ts: Date.now(), payload });
      });
      this.unsubs.push(unsub);
    }

    this.flushTimer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        this.log.error(`Journal flush failed: ${errorMessage(error)}`);
      });
    }, this.config.flushMs);
  }

  async stop(): Promise<void> {
    if (!this.config.enabled) return;
    if (this.flushTimer) clearInterval(this.flushTimer);
    this.flushTimer = undefined;
    for (const unsub of this.unsubs) unsub();
    this.unsubs = [];
    await this.flush();
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Writes are chained so rows land in arrival order. */
  flush(): Promise<void> {
    if (this.buffer.length === 0) return this.writing;
    const lines = this.buffer.splice(0).map((row) => JSON.stringify(row)).join("\n") + "\n";
    const write = this.writing.then(() => appendFile(this.config.path, lines, "utf8"));
    // The caller sees the failure; later writes still run.
    this.writing = write.catch(() => undefined);
    return write;
  }
}
