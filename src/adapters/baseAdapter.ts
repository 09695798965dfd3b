import type { QuakeEvent, QuakeEventType, QuakeExtra } from "../types/quake";
import type { Adapter, AdapterContext, AdapterFamily } from "./types";

export interface EventFields {
  type: QuakeEventType;
  source: string;
  eventId?: string;
  placeName?: string;
  magnitude?: number;
  latitude?: number;
  longitude?: number;
  depth?: number;
  shockTime?: string;
  extra?: QuakeExtra;
}

export abstract class BaseAdapter implements Adapter {
  abstract readonly family: AdapterFamily;

  constructor(protected readonly ctx: AdapterContext) {}

  parse(raw: unknown): QuakeEvent | null {
    return this.parseAll(raw)[0] ?? null;
  }

  parseAll(raw: unknown): QuakeEvent[] {
    try {
      return this.decode(raw);
    } catch {
      // Malformed vendor payload.
      return [];
    }
  }

  protected abstract decode(raw: unknown): QuakeEvent[];

  protected event(fields: EventFields): QuakeEvent {
    return {
      type: fields.type,
      source: fields.source,
      eventId: fields.eventId ?? "",
      organization: this.ctx.organizationOf(fields.source),
      placeName: fields.placeName ?? "",
      magnitude: fields.magnitude ?? 0,
      latitude: fields.latitude ?? 0,
      longitude: fields.longitude ?? 0,
      depth: fields.depth ?? 0,
      shockTime: fields.shockTime ?? "",
      extra: fields.extra ?? {},
      receivedAt: this.ctx.now()
    };
  }
}
