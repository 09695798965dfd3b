import { ModuleRegistry } from "../src/boot/moduleRegistry";
import { DEFAULTS } from "../src/config/defaults";
import { createPriorityLookup } from "../src/config/sourceTables";
import { DisplayArbiter } from "../src/core/displayArbiter";
import type { DisplaySink } from "../src/types/display";
import type { QuakeEvent } from "../src/types/quake";
import { formatInZone } from "../src/utils/timezone";

const SOURCES = ["cenc", "usgs", "emsc", "cwa", "jma", "cea", "sichuan", "weatheralarm"] as const;

/** Accepts everything and finishes instantly, so only arbitration cost is measured. */
class CountingSink implements DisplaySink {
  updates = 0;

  updateText(): boolean {
    this.updates += 1;
    return true;
  }

  isScrolling(): boolean {
    return false;
  }

  attachImage(): void {
    return;
  }
}

function syntheticEvent(index: number, now: number): QuakeEvent {
  const source = SOURCES[index % SOURCES.length] ?? "cenc";
  const type = source === "weatheralarm" ? "weather" : source === "cea" || source === "sichuan" ? "warning" : "report";
  return {
    type,
    source,
    eventId: `bench-${source}-${index % 50}`,
    organization: "",
    placeName: `测试地点${index % 97}`,
    magnitude: 3 + (index % 40) / 10,
    latitude: 30,
    longitude: 104,
    depth: 10,
    shockTime: formatInZone(now - 1000, DEFAULTS.timezone),
    extra: type === "weather" ? { headline: "某市气象台发布暴雨黄色预警" } : { updates: 1 + (index % 5) },
    receivedAt: now
  };
}

async function main(): Promise<void> {
  const registry = new ModuleRegistry();
  const sink = new CountingSink();
  const arbiter = new DisplayArbiter(
    registry,
    {
      timezone: DEFAULTS.timezone,
      message: DEFAULTS.message,
      arbiter: { ...DEFAULTS.arbiter, batchSize: 50, queueCapacity: 1000 }
    },
    { sink, priorityOf: createPriorityLookup() }
  );

  let decisions = 0;
  const unsub = registry.on("display.decision", () => {
    decisions += 1;
  });

  const total = 200_000;
  const start = performance.now();
  for (let i = 0; i < total; i++) {
    arbiter.submit("", syntheticEvent(i, Date.now()));
    if (i % 50 === 49) {
      arbiter.tick();
      arbiter.handleScrollCompleted();
    }
  }
  arbiter.tick();
  const elapsed = performance.now() - start;

  await new Promise<void>((resolve) => setTimeout(resolve, 0));
  unsub();

  const eps = (total / elapsed) * 1000;
  console.log(
    `bench: events=${total} elapsedMs=${elapsed.toFixed(0)} eventsPerSec=${eps.toFixed(0)} sinkUpdates=${sink.updates} decisions=${decisions} ${arbiter.describe()}`
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
