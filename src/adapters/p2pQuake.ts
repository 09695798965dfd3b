import { z } from "zod";
import type { QuakeEvent, QuakeExtra } from "../types/quake";
import { jstToDisplay } from "../utils/timezone";
import { BaseAdapter } from "./baseAdapter";
import { safeFloat, str } from "./fields";
import { P2PQuakeItemSchema } from "./schemas";
import type { AdapterFamily } from "./types";

/** JMA earthquake information (code 551) from the P2PQuake history endpoint. */
export class P2PQuakeAdapter extends BaseAdapter {
  readonly family: AdapterFamily = "p2pquake";

  protected decode(raw: unknown): QuakeEvent[] {
    const list = z.array(z.unknown()).safeParse(raw);
    if (!list.success) return [];

    const events: QuakeEvent[] = [];
    for (const entry of list.data) {
      const event = this.item(entry);
      if (event) events.push(event);
    }
    return events;
  }

  private item(entry: unknown): QuakeEvent | null {
    const parsed = P2PQuakeItemSchema.safeParse(entry);
    if (!parsed.success) return null;
    const { id, earthquake, issue } = parsed.data;
    const hypocenter = earthquake.hypocenter ?? {};

    const extra: QuakeExtra = {};
    const maxScale = safeFloat(earthquake.maxScale);
    if (maxScale) extra.maxScale = maxScale;
    const issueTime = str(issue?.time);
    if (issueTime) extra.issueTime = jstToDisplay(issueTime, this.ctx.zone);

    const time = str(earthquake.time);
    return this.event({
      type: "report",
      source: "p2pquake",
      eventId: str(id),
      placeName: str(hypocenter.name) || "未知地区",
      magnitude: safeFloat(hypocenter.magnitude),
      latitude: safeFloat(hypocenter.latitude),
      longitude: safeFloat(hypocenter.longitude),
      depth: safeFloat(hypocenter.depth),
      shockTime: time ? jstToDisplay(time, this.ctx.zone) : "",
      extra
    });
  }
}
