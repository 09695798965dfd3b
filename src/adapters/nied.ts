import type { QuakeEvent } from "../types/quake";
import { jstToDisplay } from "../utils/timezone";
import { BaseAdapter } from "./baseAdapter";
import { depthKm, firstString, safeFloat, str } from "./fields";
import { NiedFrameSchema } from "./schemas";
import type { AdapterFamily } from "./types";

export class NiedAdapter extends BaseAdapter {
  readonly family: AdapterFamily = "nied";

  protected decode(raw: unknown): QuakeEvent[] {
    const frame = NiedFrameSchema.safeParse(raw);
    if (!frame.success) return [];
    const data = frame.data.data;
    if (data.is_cancel === true) return [];

    const origin = str(data.origin_time);
    return [
      this.event({
        type: "warning",
        source: "nied",
        eventId: firstString(data.report_id, origin),
        placeName: str(data.region_name) || "未知",
        magnitude: safeFloat(data.magunitude) || safeFloat(data.magnitude),
        latitude: safeFloat(data.latitude),
        longitude: safeFloat(data.longitude),
        depth: depthKm(data.depth),
        shockTime: origin ? jstToDisplay(origin, this.ctx.zone) : ""
      })
    ];
  }
}
