import type { DisplayMessage } from "../types/display";
import { nowWallClock, parseDisplayTime } from "../utils/timezone";

export interface ValidityOptions {
  shockValiditySeconds: number;
  minDisplaySeconds: number;
  zone: string;
}

const TEXT_TIME_PATTERNS = [
  /，(\d{4}[-/]\d{1,2}[-/]\d{1,2}\s+\d{1,2}:\d{1,2}:\d{1,2})/,
  /(\d{4}[-/]\d{1,2}[-/]\d{1,2}\s+\d{1,2}:\d{1,2}:\d{1,2})/
];

export function extractShockTimeFromText(text: string): string | undefined {
  for (const pattern of TEXT_TIME_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) return match[1].replace(/\s+/, " ");
  }
  return undefined;
}

/** True unless the shock time parses and is older than the validity window. */
export function isShockTimeFresh(shockTime: string | undefined, now: number, options: ValidityOptions): boolean {
  const shockWall = parseDisplayTime(shockTime);
  if (shockWall === null) return true;
  return nowWallClock(options.zone, now) - shockWall <= options.shockValiditySeconds * 1000;
}

/**
 * A shown warning stays valid for the minimum display window from its first display.
 * Before that it is judged by shock-time age, taken from the text when the field is missing.
 */
export function isWarningValid(message: DisplayMessage, now: number, options: ValidityOptions): boolean {
  if (message.firstDisplayedAt !== null) {
    return now - message.firstDisplayedAt < options.minDisplaySeconds * 1000;
  }
  const shockTime = message.shockTime ?? extractShockTimeFromText(message.text);
  return isShockTimeFresh(shockTime, now, options);
}
