import { describe, expect, it } from "vitest";
import { adapterContext } from "../testing/fixtures";
import { P2PQuakeTsunamiAdapter } from "./p2pQuakeTsunami";

describe("P2PQuakeTsunamiAdapter", () => {
  const adapter = new P2PQuakeTsunamiAdapter(adapterContext());

  it("should describe grade, height and arrival per area", () => {
    const event = adapter.parse([
      {
        id: "t-1",
        cancelled: false,
        issue: { time: "2026/03/01 13:00:00", type: "Focus" },
        areas: [
          { grade: "Warning", immediate: true, name: "岩手県", maxHeight: { description: "３ｍ", value: 3 } },
          { grade: "Watch", immediate: false, name: "宮城県", firstHeight: { arrivalTime: "2026/03/01 13:30:00" } }
        ]
      }
    ]);

    expect(event).toMatchObject({
      type: "report",
      source: "p2pquake_tsunami",
      eventId: "t-1",
      organization: "日本气象厅海啸预报",
      placeName: "警报 预计浪高约３ｍ。岩手県(立即)、宮城県(12:30)",
      shockTime: "2026-03-01 12:00:00",
      extra: { isTsunami: true, issueTime: "2026-03-01 12:00:00" }
    });
  });

  it("should format a height given only as a value", () => {
    expect(adapter.detail([{ grade: "MajorWarning", name: "", maxHeight: { value: 10 } }], "海啸情报")).toBe(
      "大津波警报 预计浪高约10m。"
    );
  });

  it("should fall back to the issue type without areas", () => {
    expect(adapter.parse([{ id: "t-2", issue: { time: "2026/03/01 13:00:00" } }])?.placeName).toBe("海啸情报");
  });

  it("should drop cancelled forecasts and empty lists", () => {
    expect(adapter.parseAll([{ id: "t-3", cancelled: true }])).toEqual([]);
    expect(adapter.parseAll([])).toEqual([]);
  });
});
