import type { QuakeEvent, QuakeExtra } from "../types/quake";
import { cstToDisplay, jstToDisplay } from "../utils/timezone";
import { BaseAdapter } from "./baseAdapter";
import { depthKm, firstString, safeFloat, str } from "./fields";
import { RecordSchema, type VendorRecord } from "./schemas";
import type { AdapterContext, AdapterFamily } from "./types";

const EEW_TYPES: ReadonlySet<string> = new Set(["sc_eew", "jma_eew", "fj_eew", "cenc_eew", "cwa_eew"]);
const EQLIST_TYPES: ReadonlySet<string> = new Set(["cenc_eqlist", "jma_eqlist"]);

const UNKNOWN_PLACE = "未知";

export function isWolfxEqlist(sourceType: string): boolean {
  return EQLIST_TYPES.has(sourceType);
}

/**
 * Wolfx EEW pushes and the `*_eqlist` digests. HTTP endpoints omit `type`, so the
 * connection's own type stands in for it.
 */
export class WolfxAdapter extends BaseAdapter {
  readonly family: AdapterFamily = "wolfx";

  constructor(
    ctx: AdapterContext,
    private readonly sourceType: string
  ) {
    super(ctx);
  }

  protected decode(raw: unknown): QuakeEvent[] {
    const parsed = RecordSchema.safeParse(raw);
    if (!parsed.success) return [];
    const data = parsed.data;

    const frameType = str(data.type);
    if (frameType === "heartbeat" || frameType === "pong") return [];

    const kind = frameType || this.sourceType;
    const event = EEW_TYPES.has(kind) ? this.eew(data, kind) : EQLIST_TYPES.has(kind) ? this.eqlist(data, kind) : null;
    return event ? [event] : [];
  }

  private eew(data: VendorRecord, kind: string): QuakeEvent | null {
    if (data.isCancel === true) return null;

    const origin = str(data.OriginTime);
    const reported = str(data.ReportTime);
    let shockTime = "";
    if (origin) shockTime = kind === "jma_eew" ? jstToDisplay(origin, this.ctx.zone) : cstToDisplay(origin, this.ctx.zone);
    else if (reported) shockTime = cstToDisplay(reported, this.ctx.zone);

    const extra: QuakeExtra = {};
    const maxIntensity = str(data.MaxIntensity);
    if (maxIntensity) extra.maxIntensity = maxIntensity;

    return this.event({
      type: "warning",
      source: `wolfx_${kind}`,
      eventId: firstString(data.EventID, data.ID),
      placeName: firstString(data.HypoCenter, data.Hypocenter) || UNKNOWN_PLACE,
      magnitude: safeFloat(data.Magunitude) || safeFloat(data.Magnitude),
      latitude: safeFloat(data.Latitude),
      longitude: safeFloat(data.Longitude),
      depth: safeFloat(data.Depth),
      shockTime,
      extra
    });
  }

  /** Only `No1`, the latest entry, is surfaced. */
  private eqlist(data: VendorRecord, kind: string): QuakeEvent | null {
    const latest = RecordSchema.safeParse(data.No1);
    let item: VendorRecord;
    if (latest.success) item = latest.data;
    else if (typeof data.time === "string" || typeof data.location === "string") item = data;
    else return null;

    const isJma = kind === "jma_eqlist";
    const rawTime = isJma ? firstString(item.time_full, item.time) : str(item.time);
    let shockTime = "";
    if (rawTime) shockTime = isJma ? jstToDisplay(rawTime, this.ctx.zone) : cstToDisplay(rawTime, this.ctx.zone);

    return this.event({
      type: "report",
      source: `wolfx_${kind}`,
      placeName: firstString(item.placeName, item.location) || UNKNOWN_PLACE,
      magnitude: safeFloat(item.magnitude),
      latitude: safeFloat(item.latitude),
      longitude: safeFloat(item.longitude),
      depth: depthKm(item.depth),
      shockTime
    });
  }
}
