export const CST_OFFSET_HOURS = 8;
export const JST_OFFSET_HOURS = 9;

const HOUR_MS = 3_600_000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(zone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: zone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit"
    });
    formatters.set(zone, formatter);
  }
  return formatter;
}

interface WallParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function zonedParts(epochMs: number, zone: string): WallParts {
  const parts: WallParts = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  for (const part of formatterFor(zone).formatToParts(new Date(epochMs))) {
    const value = Number(part.value);
    switch (part.type) {
      case "year":
        parts.year = value;
        break;
      case "month":
        parts.month = value;
        break;
      case "day":
        parts.day = value;
        break;
      case "hour":
        parts.hour = value;
        break;
      case "minute":
        parts.minute = value;
        break;
      case "second":
        parts.second = value;
        break;
      default:
        break;
    }
  }
  return parts;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatParts(p: WallParts): string {
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

function wallMsOf(p: WallParts): number {
  return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
}

/** `YYYY-MM-DD HH:MM:SS` of an instant as seen in `zone`. */
export function formatInZone(epochMs: number, zone: string): string {
  return formatParts(zonedParts(epochMs, zone));
}

/** Naive wall-clock milliseconds (the zone's clock reading encoded as if it were UTC). */
export function wallClockOf(epochMs: number, zone: string): number {
  return wallMsOf(zonedParts(Math.floor(epochMs / 1000) * 1000, zone));
}

/** Inverse of `wallClockOf`; the second pass settles instants next to a DST change. */
export function zonedWallToEpoch(wallMs: number, zone: string): number {
  const offsetAt = (epochMs: number): number => wallClockOf(epochMs, zone) - Math.floor(epochMs / 1000) * 1000;
  const guess = wallMs - offsetAt(wallMs);
  return wallMs - offsetAt(guess);
}

const SEPARATED =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})[ T](\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.\d+)?)?$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?$/;

function validParts(p: WallParts): boolean {
  if (p.month < 1 || p.month > 12 || p.hour > 23 || p.minute > 59 || p.second > 59) return false;
  const probe = new Date(wallMsOf(p));
  return probe.getUTCDate() === p.day && probe.getUTCMonth() === p.month - 1;
}

/** Parses a vendor wall-clock string into naive wall milliseconds, or null. */
export function parseWallTime(input: string): number | null {
  const text = input.trim();
  const match = SEPARATED.exec(text) ?? COMPACT.exec(text);
  if (!match) return null;
  const parts: WallParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: match[6] === undefined ? 0 : Number(match[6])
  };
  return validParts(parts) ? wallMsOf(parts) : null;
}

function fixedOffsetToDisplay(input: string, offsetHours: number, zone: string): string {
  if (!input) return "";
  const wall = parseWallTime(input);
  if (wall === null) return input;
  return formatInZone(wall - offsetHours * HOUR_MS, zone);
}

export function cstToDisplay(input: string, zone: string): string {
  return fixedOffsetToDisplay(input, CST_OFFSET_HOURS, zone);
}

export function jstToDisplay(input: string, zone: string): string {
  return fixedOffsetToDisplay(input, JST_OFFSET_HOURS, zone);
}

export function utcToDisplay(input: string, zone: string): string {
  if (!input) return "";
  const text = input.trim();
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(text);
  const epoch = Date.parse(hasZone ? text : `${text.replace(" ", "T")}Z`);
  return Number.isNaN(epoch) ? input : formatInZone(epoch, zone);
}

/** Accepts Unix seconds or milliseconds. */
export function timestampToDisplay(timestamp: number, zone: string): string {
  if (!Number.isFinite(timestamp)) return "";
  const epochMs = timestamp > 1e10 ? timestamp : timestamp * 1000;
  return formatInZone(epochMs, zone);
}

/** Parses `Y-m-d H:M:S` or `Y/m/d H:M:S` display strings into naive wall milliseconds. */
export function parseDisplayTime(input: string | undefined): number | null {
  if (!input) return null;
  const match = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/.exec(input.trim());
  if (!match) return null;
  const parts: WallParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6])
  };
  return validParts(parts) ? wallMsOf(parts) : null;
}

export function nowWallClock(zone: string, now: number = Date.now()): number {
  return wallClockOf(now, zone);
}

export function nowDisplayString(zone: string, now: number = Date.now()): string {
  return formatInZone(now, zone);
}
