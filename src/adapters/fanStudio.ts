import type { QuakeEvent, QuakeExtra } from "../types/quake";
import { cstToDisplay, jstToDisplay } from "../utils/timezone";
import { BaseAdapter } from "./baseAdapter";
import { firstString, safeFloat, str } from "./fields";
import { FanStudioEnvelopeSchema, FanStudioFrameSchema, RecordSchema, type VendorRecord } from "./schemas";
import type { AdapterContext, AdapterFamily } from "./types";

export const FANSTUDIO_WARNING_SOURCES = ["cea", "cea-pr", "sichuan", "cwa-eew", "jma", "sa", "kma-eew"] as const;
export const FANSTUDIO_REPORT_SOURCES = [
  "cenc",
  "ningxia",
  "guangxi",
  "shanxi",
  "beijing",
  "cwa",
  "hko",
  "usgs",
  "emsc",
  "bcsf",
  "gfz",
  "usp",
  "kma",
  "fssn"
] as const;
export const FANSTUDIO_WEATHER_SOURCE = "weatheralarm";

const INITIAL_ORDER: readonly string[] = [
  ...FANSTUDIO_WARNING_SOURCES,
  ...FANSTUDIO_REPORT_SOURCES,
  FANSTUDIO_WEATHER_SOURCE
];
const WARNING_SOURCES: ReadonlySet<string> = new Set(FANSTUDIO_WARNING_SOURCES);

export interface FanStudioOptions {
  /** Path segment of the connection, `all` for the multiplexed stream. */
  sourceType: string;
  /** Sub-sources accepted from the `all` stream; empty accepts every source. */
  acceptedSources?: readonly string[];
}

export class FanStudioAdapter extends BaseAdapter {
  readonly family: AdapterFamily = "fanstudio";
  private readonly sourceType: string;
  private readonly accepted: ReadonlySet<string>;

  constructor(ctx: AdapterContext, options: FanStudioOptions) {
    super(ctx);
    this.sourceType = options.sourceType;
    this.accepted = new Set(options.acceptedSources ?? []);
  }

  protected decode(raw: unknown): QuakeEvent[] {
    const frame = FanStudioFrameSchema.safeParse(raw);
    if (!frame.success) return [];
    const { type, source, Data } = frame.data;

    if (type === "heartbeat" || type === "error") return [];
    if (type === "initial_all") return this.decodeInitial(raw);

    if (type === "update") {
      if (!source || !Data) return [];
      if (this.sourceType === "all") return this.accepts(source) ? this.single(Data, source) : [];
      return source === this.sourceType ? this.single(Data, this.sourceType) : [];
    }

    return Data ? this.single(Data, this.sourceType) : [];
  }

  private accepts(source: string): boolean {
    return this.accepted.size === 0 || this.accepted.has(source);
  }

  private decodeInitial(raw: unknown): QuakeEvent[] {
    const sections = RecordSchema.parse(raw);
    const wanted = this.sourceType === "all" ? INITIAL_ORDER.filter((source) => this.accepts(source)) : [this.sourceType];

    const events: QuakeEvent[] = [];
    for (const source of wanted) {
      const envelope = FanStudioEnvelopeSchema.safeParse(sections[source]);
      if (!envelope.success || !envelope.data.Data) continue;
      events.push(...this.single(envelope.data.Data, source));
    }
    return events;
  }

  private single(data: VendorRecord, source: string): QuakeEvent[] {
    if (Object.keys(data).length === 0) return [];
    let event: QuakeEvent | null;
    if (source === FANSTUDIO_WEATHER_SOURCE) event = this.weather(data);
    else if (WARNING_SOURCES.has(source)) event = this.warning(data, source);
    else event = this.report(data, source);
    return event ? [event] : [];
  }

  private report(data: VendorRecord, source: string): QuakeEvent | null {
    let placeName: string;
    if (source === "cwa") placeName = cwaLocation(data);
    else if (source === "fssn") placeName = firstString(data.placeName_zh, data.placeName, data.title);
    else placeName = firstString(data.placeName, data.title);

    const rawTime = firstString(data.shockTime, data.createTime);
    if (!placeName && !rawTime) return null;

    const extra: QuakeExtra = {};
    const infoType = str(data.infoTypeName);
    if (infoType) extra.infoType = infoType;
    if (source === "kma" && data.epiIntensity !== undefined) extra.epiIntensity = safeFloat(data.epiIntensity);

    return this.event({
      type: "report",
      source,
      eventId: firstString(data.eventId, data.id),
      placeName,
      magnitude: safeFloat(data.magnitude),
      latitude: safeFloat(data.latitude),
      longitude: safeFloat(data.longitude),
      depth: safeFloat(data.depth),
      shockTime: rawTime ? cstToDisplay(rawTime, this.ctx.zone) : "",
      extra
    });
  }

  private warning(data: VendorRecord, source: string): QuakeEvent {
    const placeName = firstString(data.placeName, data.place_name, data.location, data.loc, data.epicenter, data.locationDesc);
    const rawTime = firstString(
      data.shockTime,
      data.shock_time,
      data.createTime,
      data.time,
      data.timestamp,
      data.originTime
    );
    let shockTime = "";
    if (rawTime) shockTime = source === "jma" ? jstToDisplay(rawTime, this.ctx.zone) : cstToDisplay(rawTime, this.ctx.zone);

    const extra: QuakeExtra = { updates: updateCount(data.updates) };
    const intensity = safeFloat(data.epiIntensity) || safeFloat(data.maxIntensity);
    if (intensity > 0) extra.epiIntensity = intensity;

    if (source === "jma") {
      const infoType = str(data.infoTypeName);
      if (infoType) extra.infoType = infoType;
      if (data.final !== undefined) extra.final = data.final === true;
      if (data.cancel !== undefined) extra.cancel = data.cancel === true;
    }
    if (source === "cea-pr") {
      const province = str(data.province);
      if (province) extra.province = province;
    }
    if (source === "sichuan") {
      const infoType = str(data.infoTypeName);
      if (infoType) extra.infoType = infoType;
    }

    return this.event({
      type: "warning",
      source,
      eventId: firstString(data.eventId, data.id),
      placeName,
      magnitude: safeFloat(data.magnitude),
      latitude: safeFloat(data.latitude),
      longitude: safeFloat(data.longitude),
      depth: safeFloat(data.depth),
      shockTime,
      extra
    });
  }

  private weather(data: VendorRecord): QuakeEvent {
    const title = firstString(data.title, data.headline);
    const headline = firstString(data.headline, data.title);
    const effective = str(data.effective);

    let eventId = firstString(data.id, data.eventId);
    if (!eventId && title && effective) eventId = `${title}_${effective}`;

    return this.event({
      type: "weather",
      source: FANSTUDIO_WEATHER_SOURCE,
      eventId,
      placeName: headline,
      latitude: safeFloat(data.latitude),
      longitude: safeFloat(data.longitude),
      shockTime: effective,
      extra: {
        title,
        headline,
        description: str(data.description),
        warningType: str(data.type)
      }
    });
  }
}

function updateCount(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? 1 : parsed;
  }
  return 1;
}

/** CWA puts the readable place in parentheses: `花蓮縣政府南南東 30.2 公里 (位於花蓮縣近海)`. */
function cwaLocation(data: VendorRecord): string {
  const raw = (firstString(data.loc, data.placeName) || "未知地区").trim();
  const bracket = /\(([^)]+)\)/.exec(raw);
  if (!bracket?.[1]) return raw;
  const inner = bracket[1].replace("位於", "").replace(/\s+/g, " ").trim();
  return inner || raw;
}
