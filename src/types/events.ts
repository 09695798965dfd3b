import type { BufferRow, DisplayMode, MessageType } from "./display";
import type { FeedConnectionEvent } from "./feed";
import type { QuakeEventType } from "./quake";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogEvent {
  level: LogLevel;
  scope: string;
  message: string;
  ts: number;
}

export interface FeedEventNotice {
  source: string;
  type: QuakeEventType;
  ts: number;
}

export interface AdmissionRejectedEvent {
  source: string;
  eventId: string;
  reason: string;
  ts: number;
}

export interface DisplayDecision {
  mode: DisplayMode;
  messageId: number;
  source: string;
  messageType: MessageType;
  text: string;
  forced: boolean;
  accepted: boolean;
  ts: number;
}

export interface DisplayFrame {
  visible: string;
  color: string;
  imageRef?: string;
  progress: number;
  ts: number;
}

export interface BufferSnapshot {
  mode: DisplayMode;
  warnings: BufferRow[];
  reports: BufferRow[];
  ts: number;
}

export interface MetricsSnapshot {
  eventsPerSec: number;
  ingested: number;
  queueDropped: number;
  admissionRejected: number;
  displaySwitches: number;
  warningBuffered: number;
  reportBuffered: number;
  commandP50Ms: number;
  commandP99Ms: number;
  updatedAt: number;
}

export interface EventMap {
  "feed.connection": FeedConnectionEvent;
  "feed.event": FeedEventNotice;
  "queue.dropped": { source: string; ts: number };
  "admission.rejected": AdmissionRejectedEvent;
  "display.decision": DisplayDecision;
  "display.frame": DisplayFrame;
  "scroll.completed": { scrollId: number; ts: number };
  "buffer.snapshot": BufferSnapshot;
  "metrics.updated": MetricsSnapshot;
  "command.latency": { command: string; ms: number; ts: number };
  "config.reloaded": { path: string; ts: number };
  log: LogEvent;
}

export type EventKey = keyof EventMap;
