import type { DisplayMessage, MessageType } from "../types/display";
import type { QuakeEvent } from "../types/quake";

export interface IdentityOptions {
  windowMs: number;
  prefixLength: number;
}

export const DEFAULT_IDENTITY: IdentityOptions = { windowMs: 30_000, prefixLength: 80 };

let lastMessageId = 0;

/** Monotonic identity token for every DisplayMessage created in this process. */
export function nextMessageId(): number {
  lastMessageId += 1;
  return lastMessageId;
}

export interface MessageInit {
  text: string;
  color: string;
  source: string;
  messageType: MessageType;
  eventId?: string;
  shockTime?: string;
  imageRef?: string;
  event?: QuakeEvent;
  createdAt?: number;
}

export function createDisplayMessage(init: MessageInit): DisplayMessage {
  return {
    id: nextMessageId(),
    text: init.text,
    color: init.color,
    source: init.source,
    eventId: init.eventId ?? "",
    shockTime: init.shockTime || undefined,
    messageType: init.messageType,
    imageRef: init.imageRef,
    createdAt: init.createdAt ?? Date.now(),
    firstDisplayedAt: null,
    event: init.event
  };
}

const REVISION_MARKERS = [/第\s*\d+\s*报/g, /最终报/g, /final report/gi];
const PUNCTUATION = /[\s,，。.]+/g;

/** Strips revision counters and punctuation so successive reports of one event compare equal. */
export function normalizeWarningText(text: string): string {
  let out = text;
  for (const marker of REVISION_MARKERS) out = out.replace(marker, "");
  return out.replace(PUNCTUATION, "").trim();
}

type Identifiable = Pick<DisplayMessage, "source" | "eventId" | "text" | "shockTime" | "createdAt">;

export function isSameEvent(a: Identifiable, b: Identifiable, options: IdentityOptions = DEFAULT_IDENTITY): boolean {
  if (a.source !== b.source) return false;

  const aHasId = a.eventId.length > 0;
  const bHasId = b.eventId.length > 0;
  if (aHasId && bHasId) return a.eventId === b.eventId;
  if (aHasId !== bHasId) return false;

  const aText = normalizeWarningText(a.text);
  const bText = normalizeWarningText(b.text);
  if (aText && aText === bText) return true;

  if (a.shockTime && a.shockTime === b.shockTime) return true;

  if (aText && bText && Math.abs(a.createdAt - b.createdAt) < options.windowMs) {
    return aText.slice(0, options.prefixLength) === bText.slice(0, options.prefixLength);
  }
  return false;
}
