import { z } from "zod";
import type { QuakeEvent } from "../types/quake";
import { jstToDisplay } from "../utils/timezone";
import { BaseAdapter } from "./baseAdapter";
import { firstString, str } from "./fields";
import { TsunamiAreaSchema, TsunamiItemSchema, type TsunamiArea } from "./schemas";
import type { AdapterFamily } from "./types";

const GRADES: Record<string, string> = {
  Watch: "注意报",
  Warning: "警报",
  MajorWarning: "大津波警报"
};

const MAX_AREAS = 6;

/** Latest JMA tsunami forecast; a cancelled forecast yields nothing. */
export class P2PQuakeTsunamiAdapter extends BaseAdapter {
  readonly family: AdapterFamily = "p2pquake_tsunami";

  protected decode(raw: unknown): QuakeEvent[] {
    const list = z.array(z.unknown()).safeParse(raw);
    if (!list.success || list.data.length === 0) return [];

    const parsed = TsunamiItemSchema.safeParse(list.data[0]);
    if (!parsed.success || parsed.data.cancelled === true) return [];
    const item = parsed.data;

    const issueTime = firstString(item.issue?.time, item.time);
    const issueType = str(item.issue?.type) || "海啸情报";
    const shockTime = issueTime ? jstToDisplay(issueTime, this.ctx.zone) : "";

    return [
      this.event({
        type: "report",
        source: "p2pquake_tsunami",
        eventId: str(item.id),
        placeName: this.detail(item.areas ?? [], issueType),
        shockTime,
        extra: { isTsunami: true, issueTime: shockTime || undefined }
      })
    ];
  }

  /** `警报 预计浪高约3m。岩手県(立即)、宮城県(11:30)` */
  detail(rawAreas: readonly unknown[], fallback: string): string {
    const areas = rawAreas.map((area): TsunamiArea | null => {
      const parsed = TsunamiAreaSchema.safeParse(area);
      return parsed.success ? parsed.data : null;
    });
    if (areas.length === 0) return fallback;

    let grade = "";
    let height = "";
    for (const area of areas) {
      if (!area) continue;
      const rawGrade = str(area.grade);
      if (!grade && rawGrade) grade = GRADES[rawGrade] ?? rawGrade;
      const max = area.maxHeight;
      if (max && (str(max.description) || (max.value !== undefined && max.value !== null))) {
        height = str(max.description) || `${str(max.value)}m`;
        break;
      }
    }

    const parts: string[] = [];
    if (grade) parts.push(`${grade} `);
    if (height) parts.push(`预计浪高约${height}。`);

    const regions: string[] = [];
    for (const area of areas.slice(0, MAX_AREAS)) {
      if (!area) continue;
      const name = firstString(area.name, area.name_en);
      if (!name) continue;
      const arrival = this.arrival(area);
      regions.push(arrival ? `${name}(${arrival})` : name);
    }
    if (regions.length > 0) parts.push(regions.join("、"));

    return parts.join("").trim() || fallback;
  }

  private arrival(area: TsunamiArea): string {
    if (area.immediate === true) return "立即";
    const at = str(area.firstHeight?.arrivalTime);
    if (!at) return "";
    const local = jstToDisplay(at, this.ctx.zone);
    const clock = local.split(" ")[1];
    if (clock) return clock.slice(0, 5);
    return at.length >= 8 ? at.slice(-8, -3) : at;
  }
}
