import type { AdapterContext } from "../adapters/types";
import { createOrganizationLookup } from "../config/sourceTables";
import type { QuakeEvent } from "../types/quake";

export const ZONE = "Asia/Shanghai";

/** Fixed instant used across arbiter and validity tests: 2026-03-01 12:00:00 in Asia/Shanghai. */
export const T0 = Date.UTC(2026, 2, 1, 4, 0, 0);

export function quakeEvent(overrides: Partial<QuakeEvent> = {}): QuakeEvent {
  return {
    type: "report",
    source: "cenc",
    eventId: "",
    organization: "中国地震台网中心自动测定/正式测定",
    placeName: "四川宜宾市珙县",
    magnitude: 4.2,
    latitude: 28.2,
    longitude: 104.7,
    depth: 10,
    shockTime: "2026-03-01 11:58:00",
    extra: {},
    receivedAt: T0,
    ...overrides
  };
}

export function adapterContext(): AdapterContext {
  return { zone: ZONE, organizationOf: createOrganizationLookup(), now: () => T0 };
}

/** Lets queued bus deliveries run. Only valid with real timers. */
export function flushBus(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
