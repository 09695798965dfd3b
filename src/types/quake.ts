export type QuakeEventType = "warning" | "report" | "weather";

export interface QuakeExtra {
  infoType?: string;
  updates?: number;
  final?: boolean;
  cancel?: boolean;
  province?: string;
  epiIntensity?: number;
  maxIntensity?: string;
  isTsunami?: boolean;
  title?: string;
  headline?: string;
  description?: string;
  warningType?: string;
  issueTime?: string;
  maxScale?: number;
}

/** Normalised event emitted by every adapter family. */
export interface QuakeEvent {
  type: QuakeEventType;
  source: string;
  /** Empty string when the vendor gives no identifier. */
  eventId: string;
  organization: string;
  placeName: string;
  magnitude: number;
  latitude: number;
  longitude: number;
  depth: number;
  /** Display-zone wall clock, `YYYY-MM-DD HH:MM:SS`, or "" when unknown. */
  shockTime: string;
  extra: QuakeExtra;
  receivedAt: number;
}
