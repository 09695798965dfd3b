import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { ArbiterConfig, MessageConfig } from "../config/defaults";
import type { PriorityLookup } from "../config/sourceTables";
import type { DisplayMessage, DisplayMode, DisplaySink } from "../types/display";
import type { SystemModule } from "../types/module";
import type { QuakeEvent } from "../types/quake";
import { createLogger, errorMessage, type Logger } from "../utils/log";
import { admitEvent, classifyBatch, isCancellation } from "./classifier";
import { EventQueue } from "./eventQueue";
import { messageColor, toDisplayMessage } from "./messageFormatter";
import { createDisplayMessage, isSameEvent, type IdentityOptions } from "./messageIdentity";
import { PriorityBuffer } from "./priorityBuffer";
import { isWarningValid, type ValidityOptions } from "./validity";

export const CUSTOM_TEXT_SOURCE = "__custom_text__";
export const PLACEHOLDER_SOURCE = "__placeholder__";

export interface ResourceLoader {
  resolveWeatherImage(event: QuakeEvent): Promise<string | undefined>;
}

export interface DisplayArbiterConfig {
  timezone: string;
  message: MessageConfig;
  arbiter: ArbiterConfig;
}

export interface DisplayArbiterDeps {
  sink: DisplaySink;
  priorityOf: PriorityLookup;
  resources?: ResourceLoader;
  now?: () => number;
}

interface Job {
  label: string;
  run: () => void;
}

/**
 * Decides which single message owns the display.
 *
 * Warnings pre-empt reports, rotate among themselves on every scroll completion and expire
 * after their minimum display time; reports rotate in priority order whenever no warning is live.
 * Every mutation runs as a job in one mailbox so ticks, scroll completions and late image lookups
 * never interleave, and a failing job leaves the buffers as they were before it.
 */
export class DisplayArbiter implements SystemModule {
  private readonly log: Logger;
  private readonly queue: EventQueue<QuakeEvent>;
  private readonly warnings: PriorityBuffer;
  private readonly reports: PriorityBuffer;
  private readonly sink: DisplaySink;
  private readonly now: () => number;

  private message: MessageConfig;
  private mode: DisplayMode = "idle";
  private onScreen: DisplayMessage | null = null;
  private pendingReportSource: string | null = null;

  private readonly mailbox: Job[] = [];
  private draining = false;
  private timer?: ReturnType<typeof setInterval>;
  private unsubs: Array<() => void> = [];

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: DisplayArbiterConfig,
    private readonly deps: DisplayArbiterDeps
  ) {
    this.log = createLogger(registry, "arbiter");
    this.sink = deps.sink;
    this.now = deps.now ?? Date.now;
    this.message = config.message;

    const identity: IdentityOptions = {
      windowMs: config.arbiter.identityWindowSeconds * 1000,
      prefixLength: config.arbiter.identityPrefixLength
    };
    this.queue = new EventQueue(config.arbiter.queueCapacity);
    this.warnings = new PriorityBuffer({ capacity: config.arbiter.bufferCapacity, priorityOf: deps.priorityOf, identity });
    this.reports = new PriorityBuffer({ capacity: config.arbiter.bufferCapacity, priorityOf: deps.priorityOf, identity });
  }

  start(): void {
    if (this.timer) return;
    this.unsubs.push(this.registry.on("scroll.completed", () => this.handleScrollCompleted()));
    if (this.message.useCustomText) this.run("custom-text", () => this.installCustomText(false));
    this.timer = setInterval(() => this.tick(), this.config.arbiter.tickMs);
    this.log.info("Display arbiter started");
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    for (const unsub of this.unsubs) unsub();
    this.unsubs = [];
  }

  /** Ingestion entry point shared by every transport. Never blocks. */
  submit(sourceName: string, event: QuakeEvent): boolean {
    const normalized = event.source ? event : { ...event, source: sourceName };
    const ts = this.now();

    const verdict = admitEvent(normalized, ts, this.validity());
    if (!verdict.admitted) {
      this.registry.emit("admission.rejected", {
        source: normalized.source,
        eventId: normalized.eventId,
        reason: verdict.reason,
        ts
      });
      this.log.debug(`Dropped ${normalized.source} warning at admission: ${verdict.reason}`);
      return false;
    }

    const { dropped } = this.queue.submit(normalized);
    if (dropped) {
      this.registry.emit("queue.dropped", { source: dropped.source, ts });
      this.log.warn(`Event queue full, dropped oldest event from ${dropped.source}`);
    }
    this.registry.emit("feed.event", { source: normalized.source, type: normalized.type, ts });
    return true;
  }

  tick(): void {
    if (this.queue.size === 0) return;
    this.run("tick", () => this.processBatch(this.queue.drain(this.config.arbiter.batchSize)));
  }

  handleScrollCompleted(): void {
    this.run("scroll-completed", () => this.onScrollCompleted());
  }

  applyMessageConfig(next: MessageConfig): void {
    this.run("config", () => this.reconfigure(next));
  }

  messageConfig(): MessageConfig {
    return this.message;
  }

  getMode(): DisplayMode {
    return this.mode;
  }

  currentMessage(): DisplayMessage | null {
    return this.onScreen;
  }

  pendingReplacement(): string | null {
    return this.pendingReportSource;
  }

  warningMessages(): readonly DisplayMessage[] {
    return this.warnings.messages();
  }

  reportMessages(): readonly DisplayMessage[] {
    return this.reports.messages();
  }

  queuedCount(): number {
    return this.queue.size;
  }

  describe(): string {
    const current = this.onScreen ? `${this.onScreen.messageType}:${this.onScreen.source}` : "none";
    return `mode=${this.mode} current=${current} warnings=${this.warnings.size} reports=${this.reports.size} queued=${this.queue.size}`;
  }

  private run(label: string, job: () => void): void {
    this.mailbox.push({ label, run: job });
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.mailbox.shift();
      while (next) {
        try {
          next.run();
        } catch (error) {
          this.log.error(`Arbiter job '${next.label}' aborted: ${errorMessage(error)}`);
        }
        next = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
    this.publishSnapshot();
  }

  private validity(): ValidityOptions {
    return {
      shockValiditySeconds: this.message.warningShockValiditySeconds,
      minDisplaySeconds: this.message.warningMinDisplaySeconds,
      zone: this.config.timezone
    };
  }

  private isValid = (message: DisplayMessage): boolean => isWarningValid(message, this.now(), this.validity());

  /** Cancellations split the batch so each one sees exactly the events that arrived before it. */
  private processBatch(events: QuakeEvent[]): void {
    let run: QuakeEvent[] = [];
    for (const event of events) {
      if (!isCancellation(event)) {
        run.push(event);
        continue;
      }
      this.processRun(run);
      run = [];
      this.guarded(`cancellation from ${event.source}`, () => this.cancel(event));
    }
    this.processRun(run);
  }

  private processRun(events: readonly QuakeEvent[]): void {
    if (events.length === 0) return;
    const batch = classifyBatch(events);

    const warnings = this.buildMessages(batch.warnings);
    if (warnings.length > 0) this.acceptWarnings(warnings);

    const reports = this.buildMessages([...batch.reports, ...batch.weather]);
    if (reports.length > 0) this.acceptReports(reports, warnings.length > 0);
  }

  private buildMessages(events: readonly QuakeEvent[]): DisplayMessage[] {
    const messages: DisplayMessage[] = [];
    const ts = this.now();
    for (const event of events) {
      this.guarded(`formatting ${event.source}`, () => {
        messages.push(toDisplayMessage(event, this.message, this.config.timezone, ts));
      });
    }
    return messages;
  }

  /** Per-message failures are logged and skipped; the rest of the batch proceeds. */
  private guarded(what: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.log.warn(`Skipped ${what}: ${errorMessage(error)}`);
    }
  }

  private acceptWarnings(incoming: DisplayMessage[]): void {
    this.warnings.batchReplaceBySource(incoming);

    if (this.mode !== "warning") {
      const first = this.highestPriority(incoming);
      if (first) this.showWarning(first, true);
      return;
    }

    const current = this.onScreen;
    const needSwitch =
      !current || current.messageType !== "warning" || incoming.some((message) => !isSameEvent(message, current));
    if (!needSwitch) {
      this.log.debug(`Same-event warning update from ${incoming.map((m) => m.source).join(",")} buffered silently`);
      return;
    }
    if (this.sink.isScrolling()) return;

    const head = this.warnings.peekFirst();
    if (head) this.showWarning(head, false);
  }

  private highestPriority(incoming: readonly DisplayMessage[]): DisplayMessage | undefined {
    let best: DisplayMessage | undefined;
    for (const message of incoming) {
      if (!best || this.deps.priorityOf(message.source) < this.deps.priorityOf(best.source)) best = message;
    }
    return best ? this.warnings.findBySource(best.source) : undefined;
  }

  private showWarning(message: DisplayMessage, force: boolean): boolean {
    if (!this.show(message, force)) return false;
    this.warnings.markDisplayed(message.id);
    this.mode = "warning";
    if (message.firstDisplayedAt === null) message.firstDisplayedAt = this.now();
    this.pendingReportSource = null;
    return true;
  }

  private acceptReports(incoming: DisplayMessage[], batchHadWarnings: boolean): void {
    if (this.message.useCustomText) {
      this.log.debug(`Custom text active, ${incoming.length} report(s) not buffered`);
      return;
    }

    for (const message of incoming) {
      if (message.messageType === "weather" && !message.imageRef) this.requestImage(message);
    }

    const replaced = this.reports.batchReplaceBySource(incoming);
    const current = this.onScreen;
    incoming.forEach((message, index) => {
      if (!replaced[index] || !current) return;
      const showingReport = current.messageType === "report" || current.messageType === "weather";
      if (showingReport && current.source === message.source) this.pendingReportSource = message.source;
    });

    if (batchHadWarnings) return;
    if (this.mode === "warning") {
      if (this.warnings.isEmpty()) this.demote();
      return;
    }
    if (this.mode === "idle") {
      this.showNextReport(true);
      return;
    }
    if (!this.sink.isScrolling()) this.showNextReport(false);
  }

  private onScrollCompleted(): void {
    // A forced update may have started a new scroll after the completion was emitted.
    if (this.sink.isScrolling()) return;

    if (!this.warnings.isEmpty()) {
      this.advanceWarnings();
      return;
    }
    if (this.mode === "warning") {
      this.demote();
      return;
    }
    this.showNextReport(false);
  }

  private advanceWarnings(): void {
    this.warnings.expirySweep(this.isValid);
    if (this.warnings.isEmpty()) {
      this.demote();
      return;
    }

    let next = this.warnings.getNext();
    if (next && !this.isValid(next)) {
      const stale = next;
      this.warnings.removeWhere((message) => isSameEvent(message, stale));
      this.warnings.expirySweep(this.isValid);
      next = this.warnings.getNext();
    }
    if (!next || !this.isValid(next)) {
      this.demote();
      return;
    }
    this.showWarning(next, false);
  }

  /** Warning → Report. Resets the report rotation so the first report is shown next. */
  private demote(): void {
    if (this.mode === "warning") {
      this.mode = "report";
      this.reports.resetCursor();
      this.pendingReportSource = null;
      this.log.info("No live warnings, returning to reports");
    }
    if (!this.sink.isScrolling()) this.showNextReport(true);
  }

  private showNextReport(force: boolean): void {
    let next: DisplayMessage | undefined;
    const pending = this.pendingReportSource;
    if (pending) next = this.reports.markDisplayedWhere((message) => message.source === pending);
    next ??= this.reports.getNext();

    if (!next) {
      this.showPlaceholder(force);
      return;
    }
    if (this.show(next, force)) {
      this.mode = "report";
      this.pendingReportSource = null;
    }
  }

  private showPlaceholder(force: boolean): void {
    const placeholder = createDisplayMessage({
      text: this.message.noActivityMessage,
      color: this.message.defaultColor,
      source: PLACEHOLDER_SOURCE,
      messageType: "placeholder",
      createdAt: this.now()
    });
    if (this.show(placeholder, force)) this.mode = "idle";
  }

  private show(message: DisplayMessage, force: boolean): boolean {
    const accepted = this.sink.updateText(message.text, message.color, message.imageRef, force);
    if (accepted) this.onScreen = message;
    this.registry.emit("display.decision", {
      mode: this.mode,
      messageId: message.id,
      source: message.source,
      messageType: message.messageType,
      text: message.text,
      forced: force,
      accepted,
      ts: this.now()
    });
    return accepted;
  }

  private cancel(event: QuakeEvent): void {
    const current = this.onScreen;
    const removed = this.warnings.removeByEventId(event.eventId, event.source);
    this.log.info(`Cancellation for ${event.source}/${event.eventId} removed ${removed} buffered warning(s)`);

    if (
      !current ||
      current.messageType !== "warning" ||
      current.source !== event.source ||
      current.eventId !== event.eventId
    ) {
      return;
    }

    const end = current.text.indexOf("】");
    const prefix = end >= 0 ? current.text.slice(0, end + 1) : `【${event.source}预警】`;
    const notice = createDisplayMessage({
      text: `${prefix}收到取消报，撤回当前预警信息`,
      color: this.message.warningColor,
      source: event.source,
      eventId: event.eventId,
      messageType: "notice",
      createdAt: this.now()
    });
    this.show(notice, true);
    this.mode = "warning";
    this.pendingReportSource = null;

    if (this.warnings.isEmpty()) this.demote();
  }

  private requestImage(message: DisplayMessage): void {
    const event = message.event;
    if (!this.deps.resources || !event) return;

    void this.deps.resources.resolveWeatherImage(event).then(
      (imageRef) => {
        if (imageRef) this.run("weather-image", () => this.attachImage(message.id, imageRef));
      },
      (error: unknown) => {
        this.log.warn(`Weather image lookup failed for ${message.source}: ${errorMessage(error)}`);
      }
    );
  }

  private attachImage(messageId: number, imageRef: string): void {
    const target = this.reports.findById(messageId);
    if (!target) return;
    target.imageRef = imageRef;
    if (this.onScreen?.id === target.id) this.sink.attachImage(imageRef);
  }

  private customText(config: MessageConfig): string {
    return config.customText || config.noActivityMessage;
  }

  private installCustomText(showNow: boolean): void {
    this.reports.clear();
    this.pendingReportSource = null;
    const entry = createDisplayMessage({
      text: this.customText(this.message),
      color: this.message.customTextColor,
      source: CUSTOM_TEXT_SOURCE,
      messageType: "custom",
      createdAt: this.now()
    });
    this.reports.add(entry);
    if (showNow && this.mode !== "warning") this.showNextReport(true);
  }

  private reconfigure(next: MessageConfig): void {
    const previous = this.message;
    this.message = next;

    for (const message of this.warnings.messages()) {
      if (message.messageType === "warning") message.color = next.warningColor;
    }
    for (const message of this.reports.messages()) {
      if (message.messageType === "report" || message.messageType === "weather") {
        message.color = messageColor(message.messageType, next, message.event);
      }
    }

    const entry = this.reports.findBySource(CUSTOM_TEXT_SOURCE);
    if (next.useCustomText && !entry) {
      this.installCustomText(true);
    } else if (next.useCustomText && entry) {
      entry.text = this.customText(next);
      entry.color = next.customTextColor;
      if (this.onScreen?.id === entry.id) this.show(entry, true);
    } else if (!next.useCustomText && entry) {
      this.reports.removeWhere((message) => message.source === CUSTOM_TEXT_SOURCE);
      if (this.onScreen?.id === entry.id) this.showNextReport(true);
    }

    if (this.onScreen?.messageType === "placeholder" && previous.noActivityMessage !== next.noActivityMessage) {
      this.showPlaceholder(true);
    }
    this.log.info("Message settings applied");
  }

  private publishSnapshot(): void {
    this.registry.emit("buffer.snapshot", {
      mode: this.mode,
      warnings: this.warnings.snapshot(),
      reports: this.reports.snapshot(),
      ts: this.now()
    });
  }
}
