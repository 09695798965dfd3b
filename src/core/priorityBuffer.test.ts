import { describe, expect, it } from "vitest";
import type { DisplayMessage } from "../types/display";
import { createDisplayMessage, type MessageInit } from "./messageIdentity";
import { PriorityBuffer } from "./priorityBuffer";

const PRIORITY: Record<string, number> = { cea: 0, jma: 0, cenc: 2, usgs: 10, emsc: 11 };

function makeBuffer(capacity = 20): PriorityBuffer {
  return new PriorityBuffer({ capacity, priorityOf: (source) => PRIORITY[source] ?? 99 });
}

function message(source: string, overrides: Partial<MessageInit> = {}): DisplayMessage {
  return createDisplayMessage({
    text: `${source} text`,
    color: "#FFFFFF",
    source,
    messageType: "report",
    createdAt: 1_000,
    ...overrides
  });
}

function sources(buffer: PriorityBuffer): string[] {
  return buffer.messages().map((m) => m.source);
}

describe("PriorityBuffer", () => {
  it("should order entries by source priority, then by arrival", () => {
    const buffer = makeBuffer();
    buffer.add(message("usgs"));
    buffer.add(message("unknown"));
    buffer.add(message("cenc"));
    buffer.add(message("emsc"));

    expect(sources(buffer)).toEqual(["cenc", "usgs", "emsc", "unknown"]);
  });

  it("should hold at most one entry per source under replace-by-source", () => {
    const buffer = makeBuffer();
    buffer.replaceBySource(message("cenc", { text: "first" }));
    const replaced = buffer.replaceBySource(message("cenc", { text: "second" }));

    expect(replaced).toBe(true);
    expect(buffer.size).toBe(1);
    expect(buffer.findBySource("cenc")?.text).toBe("second");
  });

  it("should cycle getNext in strict priority order and wrap", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([message("emsc"), message("cenc"), message("usgs")]);

    const seen = [buffer.getNext(), buffer.getNext(), buffer.getNext(), buffer.getNext()].map((m) => m?.source);

    expect(seen).toEqual(["cenc", "usgs", "emsc", "cenc"]);
  });

  it("should keep the round-robin position when the displayed entry is replaced", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([message("cenc"), message("usgs"), message("emsc")]);
    expect(buffer.getNext()?.source).toBe("cenc");
    expect(buffer.getNext()?.source).toBe("usgs");

    buffer.replaceBySource(message("usgs", { text: "usgs revised" }));

    expect(buffer.getCurrent()?.text).toBe("usgs revised");
    expect(buffer.getNext()?.source).toBe("emsc");
  });

  it("should be idempotent when the same batch is replayed", () => {
    const buffer = makeBuffer();
    const batch = () => [message("cenc", { eventId: "A" }), message("usgs", { eventId: "B" })];
    buffer.batchReplaceBySource(batch());
    const before = buffer.snapshot().map((row) => [row.source, row.text]);

    const results = buffer.batchReplaceBySource(batch());

    expect(results).toEqual([true, true]);
    expect(buffer.snapshot().map((row) => [row.source, row.text])).toEqual(before);
  });

  it("should keep the latest message per source inside one batch", () => {
    const buffer = makeBuffer();
    const results = buffer.batchReplaceBySource([
      message("cenc", { text: "older", createdAt: 1_000 }),
      message("usgs"),
      message("cenc", { text: "newer", createdAt: 2_000 })
    ]);

    expect(results).toEqual([false, false, false]);
    expect(buffer.size).toBe(2);
    expect(buffer.findBySource("cenc")?.text).toBe("newer");
  });

  it("should let the later arrival win when a batch shares one timestamp", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([
      message("jma", { eventId: "E", text: "第1报", createdAt: 1_000 }),
      message("jma", { eventId: "E", text: "第2报", createdAt: 1_000 }),
      message("jma", { eventId: "E", text: "第3报", createdAt: 1_000 })
    ]);

    expect(buffer.size).toBe(1);
    expect(buffer.findBySource("jma")?.text).toBe("第3报");
  });

  it("should keep a previous weather image when the replacement has none", () => {
    const buffer = makeBuffer();
    buffer.replaceBySource(message("weatheralarm", { messageType: "weather", imageRef: "暴雨橙色预警.jpg" }));
    buffer.replaceBySource(message("weatheralarm", { messageType: "weather", text: "updated" }));

    expect(buffer.findBySource("weatheralarm")?.imageRef).toBe("暴雨橙色预警.jpg");
  });

  it("should carry first display time onto a same-event replacement only", () => {
    const buffer = makeBuffer();
    const shown = message("cea", { eventId: "E1", messageType: "warning" });
    shown.firstDisplayedAt = 5_000;
    buffer.replaceBySource(shown);

    buffer.replaceBySource(message("cea", { eventId: "E1", messageType: "warning", text: "第2报" }));
    expect(buffer.findBySource("cea")?.firstDisplayedAt).toBe(5_000);

    buffer.replaceBySource(message("cea", { eventId: "E2", messageType: "warning" }));
    expect(buffer.findBySource("cea")?.firstDisplayedAt).toBeNull();
  });

  it("should replace by event identity and dedupe inside a batch", () => {
    const buffer = makeBuffer();
    buffer.replaceOrAdd(message("jma", { eventId: "E1", text: "one" }));

    const results = buffer.batchReplaceOrAdd([
      message("jma", { eventId: "E1", text: "two" }),
      message("jma", { eventId: "E1", text: "three" }),
      message("jma", { eventId: "E2", text: "other" })
    ]);

    expect(results).toEqual([true, true, false]);
    expect(buffer.messages().map((m) => m.text)).toEqual(["two", "other"]);
  });

  it("should evict index 0 when appending at capacity", () => {
    const buffer = makeBuffer(2);
    buffer.add(message("usgs"));
    buffer.add(message("cenc"));
    buffer.add(message("emsc"));

    expect(sources(buffer)).toEqual(["usgs", "emsc"]);
  });

  it("should clear the cursor when the displayed entry is removed", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([
      message("cea", { eventId: "X" }),
      message("jma", { eventId: "Y" }),
      message("cenc")
    ]);
    buffer.getNext();
    expect(buffer.getNext()?.source).toBe("jma");

    expect(buffer.removeByEventId("Y", "jma")).toBe(1);
    expect(buffer.getCurrent()).toBeUndefined();
    expect(buffer.getNext()?.source).toBe("cea");
  });

  it("should report whether the displayed entry expired in a sweep", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([message("cea"), message("jma")]);
    const current = buffer.getNext();

    const result = buffer.expirySweep((m) => m.source !== "cea");

    expect(current?.source).toBe("cea");
    expect(result.currentExpired).toBe(true);
    expect(result.expired.map((m) => m.source)).toEqual(["cea"]);
    expect(sources(buffer)).toEqual(["jma"]);
  });

  it("should restart from the head after resetCursor", () => {
    const buffer = makeBuffer();
    buffer.batchReplaceBySource([message("cenc"), message("usgs")]);
    buffer.getNext();
    buffer.getNext();

    buffer.resetCursor();

    expect(buffer.getNext()?.source).toBe("cenc");
  });

  it("should mark an entry displayed by id and flag it in snapshots", () => {
    const buffer = makeBuffer();
    const target = message("usgs");
    buffer.batchReplaceBySource([message("cenc"), target]);

    expect(buffer.markDisplayed(target.id)).toBe(true);
    expect(buffer.snapshot().map((row) => row.current)).toEqual([false, true]);
    expect(buffer.markDisplayed(-1)).toBe(false);
  });
});
