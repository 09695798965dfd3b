import type { QuakeEvent } from "../types/quake";
import { isShockTimeFresh, type ValidityOptions } from "./validity";

export type AdmissionVerdict = { admitted: true } | { admitted: false; reason: string };

export interface ClassifiedBatch {
  warnings: QuakeEvent[];
  reports: QuakeEvent[];
  weather: QuakeEvent[];
  cancellations: QuakeEvent[];
}

export function isCancellation(event: QuakeEvent): boolean {
  return event.type === "warning" && event.extra.cancel === true && event.eventId.length > 0;
}

/** Stale warnings never enter the queue; cancellations are exempt from the age check. */
export function admitEvent(event: QuakeEvent, now: number, options: ValidityOptions): AdmissionVerdict {
  if (event.type !== "warning" || isCancellation(event)) return { admitted: true };
  if (isShockTimeFresh(event.shockTime, now, options)) return { admitted: true };
  return {
    admitted: false,
    reason: `shock time ${event.shockTime} older than ${options.shockValiditySeconds}s`
  };
}

export function classifyBatch(events: readonly QuakeEvent[]): ClassifiedBatch {
  const batch: ClassifiedBatch = { warnings: [], reports: [], weather: [], cancellations: [] };
  for (const event of events) {
    if (isCancellation(event)) batch.cancellations.push(event);
    else if (event.type === "warning") batch.warnings.push(event);
    else if (event.type === "weather") batch.weather.push(event);
    else batch.reports.push(event);
  }
  return batch;
}
