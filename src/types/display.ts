import type { QuakeEvent } from "./quake";

export type MessageType = "warning" | "report" | "weather" | "custom" | "notice" | "placeholder";

export type DisplayMode = "idle" | "report" | "warning";

export interface DisplayMessage {
  readonly id: number;
  text: string;
  color: string;
  readonly source: string;
  readonly eventId: string;
  readonly shockTime?: string;
  readonly messageType: MessageType;
  imageRef?: string;
  readonly createdAt: number;
  firstDisplayedAt: number | null;
  readonly event?: QuakeEvent;
}

export interface DisplaySink {
  /** Returns false when a non-forced update arrives mid-scroll. */
  updateText(text: string, color: string, imageRef: string | undefined, force: boolean): boolean;
  isScrolling(): boolean;
  attachImage(imageRef: string): void;
}

export interface BufferRow {
  id: number;
  source: string;
  messageType: MessageType;
  text: string;
  color: string;
  current: boolean;
}
