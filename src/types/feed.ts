export type FeedTransport = "websocket" | "http" | "simulated";

export type ConnectionState = "connecting" | "connected" | "disconnected" | "reconnecting" | "paused";

export interface FeedConnectionEvent {
  feedId: string;
  url: string;
  transport: FeedTransport;
  state: ConnectionState;
  ts: number;
  message?: string;
}
