import type { EventKey, EventMap } from "./events";
import type { FeedTransport } from "./feed";

export type EventHandler<K extends EventKey> = (payload: EventMap[K]) => void;

/** Handlers run on a later microtask, in emit order; a throwing handler never reaches the emitter. */
export interface TypedEventBus {
  emit<K extends EventKey>(event: K, payload: EventMap[K]): void;
  on<K extends EventKey>(event: K, handler: EventHandler<K>): () => void;
  off<K extends EventKey>(event: K, handler: EventHandler<K>): void;
}

/** Started in registration order and stopped in reverse. */
export interface SystemModule {
  start(): Promise<void> | void;
  stop(): Promise<void> | void;
}

/** A live ingestion channel. `feedId` is `family:sourceType` and keys its connection events. */
export interface FeedModule extends SystemModule {
  readonly feedId: string;
  readonly url: string;
  readonly transport: Exclude<FeedTransport, "simulated">;
}
