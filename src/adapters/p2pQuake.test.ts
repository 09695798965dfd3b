import { describe, expect, it } from "vitest";
import { adapterContext } from "../testing/fixtures";
import { P2PQuakeAdapter } from "./p2pQuake";

const HISTORY = [
  {
    id: "65f0a1",
    code: 551,
    issue: { time: "2026/03/01 13:02:00" },
    earthquake: {
      time: "2026/03/01 12:58:00",
      maxScale: 30,
      hypocenter: { name: "福島県沖", magnitude: 5.3, depth: 40, latitude: 37.5, longitude: 141.6 }
    }
  },
  { id: "65f0a2", code: 552 },
  { id: "65f0a3", code: 551, earthquake: { time: "2026/03/01 12:30:00", hypocenter: { name: "", magnitude: 2.8 } } }
];

describe("P2PQuakeAdapter", () => {
  const adapter = new P2PQuakeAdapter(adapterContext());

  it("should parse every item carrying an earthquake", () => {
    const events = adapter.parseAll(HISTORY);

    expect(events.map((event) => event.eventId)).toEqual(["65f0a1", "65f0a3"]);
    expect(events[0]).toMatchObject({
      type: "report",
      source: "p2pquake",
      organization: "日本气象厅地震情报",
      placeName: "福島県沖",
      magnitude: 5.3,
      depth: 40,
      shockTime: "2026-03-01 11:58:00",
      extra: { maxScale: 30, issueTime: "2026-03-01 12:02:00" }
    });
    expect(events[1]?.placeName).toBe("未知地区");
    expect(events[1]?.extra).toEqual({});
  });

  it("should return the first event from parse", () => {
    expect(adapter.parse(HISTORY)?.eventId).toBe("65f0a1");
  });

  it("should reject non-array payloads", () => {
    expect(adapter.parseAll({ earthquake: {} })).toEqual([]);
  });
});
