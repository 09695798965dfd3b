import type { EventKey, EventMap } from "../types/events";
import type { EventHandler, SystemModule, TypedEventBus } from "../types/module";

type HandlerTable = { [K in EventKey]: Set<EventHandler<K>> };

function createHandlerTable(): HandlerTable {
  return {
    "feed.connection": new Set(),
    "feed.event": new Set(),
    "queue.dropped": new Set(),
    "admission.rejected": new Set(),
    "display.decision": new Set(),
    "display.frame": new Set(),
    "scroll.completed": new Set(),
    "buffer.snapshot": new Set(),
    "metrics.updated": new Set(),
    "command.latency": new Set(),
    "config.reloaded": new Set(),
    log: new Set()
  };
}

export class ModuleRegistry implements TypedEventBus {
  private readonly modules = new Map<string, SystemModule>();
  private readonly handlers = createHandlerTable();

  register(name: string, module: SystemModule): void {
    if (this.modules.has(name)) {
      throw new Error(`Module '${name}' is already registered`);
    }
    this.modules.set(name, module);
  }

  on<K extends EventKey>(event: K, handler: EventHandler<K>): () => void {
    const set: Set<EventHandler<K>> = this.handlers[event];
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends EventKey>(event: K, handler: EventHandler<K>): void {
    const set: Set<EventHandler<K>> = this.handlers[event];
    set.delete(handler);
  }

  emit<K extends EventKey>(event: K, payload: EventMap[K]): void {
    const set: Set<EventHandler<K>> = this.handlers[event];
    if (set.size === 0) return;
    for (const handler of set) {
      queueMicrotask(() => {
        try {
          handler(payload);
        } catch (error) {
          this.reportHandlerError(event, error);
        }
      });
    }
  }

  async startAll(): Promise<void> {
    for (const module of this.modules.values()) {
      await module.start();
    }
  }

  async stopAll(): Promise<void> {
    // Reverse registration order: feeds stop before the arbiter and sink they feed.
    const modules = [...this.modules.values()].reverse();
    for (const module of modules) {
      await module.stop();
    }
    this.modules.clear();
  }

  private reportHandlerError(event: EventKey, error: unknown): void {
    if (event === "log") return;
    const message = error instanceof Error ? error.message : String(error);
    this.emit("log", {
      level: "ERROR",
      scope: "registry",
      ts: Date.now(),
      message: `Handler for '${event}' failed: ${message}`
    });
  }
}
