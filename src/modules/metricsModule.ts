import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { MetricsSnapshot } from "../types/events";
import type { SystemModule } from "../types/module";

interface MetricsConfig {
  windowSec: number;
  publishMs: number;
}

export class MetricsModule implements SystemModule {
  private unsubs: Array<() => void> = [];
  private publishTimer?: ReturnType<typeof setInterval>;

  private eventTimes: number[] = [];
  private commandLatencies: number[] = [];
  private ingested = 0;
  private queueDropped = 0;
  private admissionRejected = 0;
  private displaySwitches = 0;
  private warningBuffered = 0;
  private reportBuffered = 0;

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: MetricsConfig,
    private readonly now: () => number = Date.now
  ) {}

  start(): void {
    this.unsubs.push(
      this.registry.on("feed.event", (evt) => {
        this.ingested += 1;
        this.eventTimes.push(evt.ts);
      })
    );

    this.unsubs.push(
      this.registry.on("queue.dropped", () => {
        this.queueDropped += 1;
      })
    );

    this.unsubs.push(
      this.registry.on("admission.rejected", () => {
        this.admissionRejected += 1;
      })
    );

    this.unsubs.push(
      this.registry.on("display.decision", (decision) => {
        if (decision.accepted) this.displaySwitches += 1;
      })
    );

    this.unsubs.push(
      this.registry.on("buffer.snapshot", (snapshot) => {
        this.warningBuffered = snapshot.warnings.length;
        this.reportBuffered = snapshot.reports.length;
      })
    );

    this.unsubs.push(
      this.registry.on("command.latency", (evt) => {
        this.commandLatencies.push(evt.ms);
      })
    );

    this.publishTimer = setInterval(() => this.publish(), this.config.publishMs);
  }

  stop(): void {
    if (this.publishTimer) clearInterval(this.publishTimer);
    this.publishTimer = undefined;
    for (const unsub of this.unsubs) unsub();
    this.unsubs = [];
  }

  snapshot(): MetricsSnapshot {
    const now = this.now();
    const cutoff = now - this.config.windowSec * 1000;
    this.eventTimes = this.eventTimes.filter((t) => t >= cutoff);

    return {
      eventsPerSec: Number((this.eventTimes.length / this.config.windowSec).toFixed(2)),
      ingested: this.ingested,
      queueDropped: this.queueDropped,
      admissionRejected: this.admissionRejected,
      displaySwitches: this.displaySwitches,
      warningBuffered: this.warningBuffered,
      reportBuffered: this.reportBuffered,
      commandP50Ms: this.percentile(this.commandLatencies, 50),
      commandP99Ms: this.percentile(this.commandLatencies, 99),
      updatedAt: now
    };
  }

  private publish(): void {
    this.registry.emit("metrics.updated", this.snapshot());
  }

  private percentile(values: number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.min(sorted.length - 1, Math.floor((p / 100) * sorted.length));
    return Number((sorted[idx] ?? 0).toFixed(2));
  }
}
