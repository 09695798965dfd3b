import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { OrganizationLookup } from "../config/sourceTables";
import type { SystemModule } from "../types/module";
import type { QuakeEvent, QuakeEventType } from "../types/quake";
import { createLogger, type Logger } from "../utils/log";
import { formatInZone } from "../utils/timezone";
import type { IngestFn } from "./websocketFeed";

interface SimulatedFeedConfig {
  enabled: boolean;
  intervalMs: number;
  timezone: string;
}

interface SimulatedFeedDeps {
  organizationOf: OrganizationLookup;
  now?: () => number;
  random?: () => number;
}

interface Epicenter {
  name: string;
  latitude: number;
  longitude: number;
}

const EPICENTERS: readonly Epicenter[] = [
  { name: "四川宜宾市珙县", latitude: 28.2, longitude: 104.7 },
  { name: "云南大理州漾濞县", latitude: 25.67, longitude: 99.87 },
  { name: "新疆阿克苏地区乌什县", latitude: 41.26, longitude: 78.63 },
  { name: "甘肃临夏州积石山县", latitude: 35.7, longitude: 102.79 },
  { name: "台湾花莲县海域", latitude: 23.81, longitude: 121.74 },
  { name: "日本本州东岸近海", latitude: 37.8, longitude: 142.2 },
  { name: "河北唐山市古冶区", latitude: 39.75, longitude: 118.44 }
];

const WEATHER_KINDS = ["暴雨", "大风", "高温", "寒潮", "雷电", "大雾"] as const;
const WEATHER_LEVELS = ["蓝色", "黄色", "橙色", "红色"] as const;
const WEATHER_ISSUERS = ["某市气象台", "某县气象台", "某区气象台"] as const;

/** Revisions of the same simulated warning are grouped within this window. */
const REVISION_WINDOW_MS = 60_000;

export class SimulatedFeed implements SystemModule {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly random: () => number;
  private timer?: ReturnType<typeof setInterval>;
  private sequence = 0;
  private lastWarning: QuakeEvent | null = null;

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: SimulatedFeedConfig,
    private readonly ingest: IngestFn,
    private readonly deps: SimulatedFeedDeps
  ) {
    this.log = createLogger(registry, "simulated");
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  start(): void {
    if (!this.config.enabled || this.timer) return;

    this.registry.emit("feed.connection", {
      feedId: "simulated",
      url: "simulated://demo",
      transport: "simulated",
      state: "connected",
      ts: Date.now(),
      message: "Simulated feed running"
    });
    this.log.info(`Simulated feed started (every ${this.config.intervalMs}ms)`);

    this.timer = setInterval(() => {
      const roll = this.random();
      if (roll < 0.2) this.simulateWarning();
      else if (roll < 0.8) this.simulateReport();
      else this.simulateWeather();
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  /** Repeating a source within a minute produces the next revision of the same event. */
  simulateWarning(source = "cea"): QuakeEvent {
    const now = this.now();
    const previous = this.lastWarning;
    const revising =
      previous !== null &&
      previous.source === source &&
      previous.extra.cancel !== true &&
      now - previous.receivedAt < REVISION_WINDOW_MS;

    const event: QuakeEvent = revising
      ? {
          ...previous,
          magnitude: Math.round((previous.magnitude + 0.1) * 10) / 10,
          extra: { ...previous.extra, updates: (previous.extra.updates ?? 1) + 1 },
          receivedAt: now
        }
      : {
          ...this.quakeBase("warning", source, now, 5_000),
          eventId: `sim-${source}-${++this.sequence}`,
          extra: { updates: 1, epiIntensity: this.randInt(3, 9) }
        };

    this.lastWarning = event;
    return this.deliver(event);
  }

  simulateReport(source = "cenc"): QuakeEvent {
    const now = this.now();
    return this.deliver({
      ...this.quakeBase("report", source, now, 120_000),
      eventId: `sim-${source}-${++this.sequence}`,
      extra: { infoType: "正式测定" }
    });
  }

  simulateWeather(): QuakeEvent {
    const now = this.now();
    const issuer = this.pick(WEATHER_ISSUERS);
    const kind = this.pick(WEATHER_KINDS);
    const level = this.pick(WEATHER_LEVELS);
    const headline = `${issuer}发布${kind}${level}预警`;
    const issued = formatInZone(now - 60_000, this.config.timezone);

    return this.deliver({
      type: "weather",
      source: "weatheralarm",
      eventId: `sim-weather-${++this.sequence}`,
      organization: this.deps.organizationOf("weatheralarm"),
      placeName: headline,
      magnitude: 0,
      latitude: 0,
      longitude: 0,
      depth: 0,
      shockTime: issued,
      extra: {
        title: headline,
        headline,
        description: `${issuer}${issued}发布${kind}${level}预警信号，请注意防范。`,
        warningType: kind
      },
      receivedAt: now
    });
  }

  /** Cancels the most recent simulated warning; null when there is none. */
  simulateCancel(): QuakeEvent | null {
    const target = this.lastWarning;
    if (!target || target.extra.cancel === true) {
      this.log.warn("No simulated warning to cancel");
      return null;
    }
    const event: QuakeEvent = {
      ...target,
      extra: { ...target.extra, cancel: true },
      receivedAt: this.now()
    };
    this.lastWarning = event;
    return this.deliver(event);
  }

  private deliver(event: QuakeEvent): QuakeEvent {
    this.log.info(`[${event.source}] simulated ${event.extra.cancel ? "cancellation" : event.type}`);
    this.ingest(event.source, event);
    return event;
  }

  private quakeBase(type: QuakeEventType, source: string, now: number, maxAgeMs: number): QuakeEvent {
    const epicenter = this.pick(EPICENTERS);
    const age = this.randInt(1_000, maxAgeMs);
    return {
      type,
      source,
      eventId: "",
      organization: this.deps.organizationOf(source),
      placeName: epicenter.name,
      magnitude: this.randInt(30, 72) / 10,
      latitude: epicenter.latitude,
      longitude: epicenter.longitude,
      depth: this.randInt(5, 30),
      shockTime: formatInZone(now - age, this.config.timezone),
      extra: {},
      receivedAt: now
    };
  }

  private pick<T>(items: readonly T[]): T {
    const item = items[this.randInt(0, items.length - 1)];
    if (item === undefined) throw new Error("Cannot pick from an empty list");
    return item;
  }

  private randInt(min: number, max: number): number {
    const lo = Math.ceil(min);
    const hi = Math.floor(max);
    return Math.floor(this.random() * (hi - lo + 1)) + lo;
  }
}
