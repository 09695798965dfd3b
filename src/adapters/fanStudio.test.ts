import { describe, expect, it } from "vitest";
import { T0, adapterContext } from "../testing/fixtures";
import { FanStudioAdapter } from "./fanStudio";

describe("FanStudioAdapter", () => {
  const all = new FanStudioAdapter(adapterContext(), { sourceType: "all" });

  it("should parse a warning update from the multiplexed stream", () => {
    const event = all.parse({
      type: "update",
      source: "cea",
      Data: {
        id: "row-17",
        eventId: "202603011158.0001",
        shockTime: "2026-03-01 11:58:10",
        placeName: "四川宜宾市珙县",
        magnitude: "4.8",
        latitude: 28.2,
        longitude: 104.7,
        depth: 12,
        updates: 2,
        epiIntensity: 6.1
      }
    });

    expect(event).toEqual({
      type: "warning",
      source: "cea",
      eventId: "202603011158.0001",
      organization: "中国地震预警网",
      placeName: "四川宜宾市珙县",
      magnitude: 4.8,
      latitude: 28.2,
      longitude: 104.7,
      depth: 12,
      shockTime: "2026-03-01 11:58:10",
      extra: { updates: 2, epiIntensity: 6.1 },
      receivedAt: T0
    });
  });

  it("should convert JMA times from JST and keep cancel flags", () => {
    const event = all.parse({
      type: "update",
      source: "jma",
      Data: {
        eventId: "20260301125800",
        originTime: "2026/03/01 12:58:00",
        placeName: "石川県能登地方",
        magnitude: 5.1,
        infoTypeName: "予報",
        final: false,
        cancel: true
      }
    });

    expect(event?.shockTime).toBe("2026-03-01 11:58:00");
    expect(event?.extra).toEqual({ updates: 1, infoType: "予報", final: false, cancel: true });
  });

  it("should ignore sub-sources that are not accepted", () => {
    const filtered = new FanStudioAdapter(adapterContext(), { sourceType: "all", acceptedSources: ["cenc"] });
    const frame = { type: "update", source: "usgs", Data: { placeName: "Alaska", shockTime: "2026-03-01 10:00:00" } };

    expect(filtered.parseAll(frame)).toEqual([]);
    expect(all.parseAll(frame)).toHaveLength(1);
  });

  it("should emit initial_all sections in warning, report, weather order", () => {
    const events = all.parseAll({
      type: "initial_all",
      weatheralarm: { Data: { id: "w-1", title: "某市发布大风蓝色预警", effective: "2026/03/01 08:00" } },
      cenc: { Data: { placeName: "云南大理州漾濞县", shockTime: "2026-03-01 09:00:00", magnitude: 3.4 } },
      cea: { Data: { eventId: "e-1", placeName: "云南大理州漾濞县", shockTime: "2026-03-01 08:59:50" } },
      hko: { Data: {} }
    });

    expect(events.map((event) => `${event.type}:${event.source}`)).toEqual([
      "warning:cea",
      "report:cenc",
      "weather:weatheralarm"
    ]);
  });

  it("should take the parenthesised CWA location", () => {
    const event = all.parse({
      type: "update",
      source: "cwa",
      Data: { loc: "花蓮縣政府南南東 30.2 公里 (位於花蓮縣近海)", shockTime: "2026-03-01 11:40:00", magnitude: 4.1 }
    });

    expect(event?.placeName).toBe("花蓮縣近海");
    expect(event?.type).toBe("report");
  });

  it("should drop a report with neither place nor time", () => {
    expect(all.parseAll({ type: "update", source: "usgs", Data: { magnitude: 5 } })).toEqual([]);
  });

  it("should derive a weather id from title and effective time", () => {
    const event = all.parse({
      type: "update",
      source: "weatheralarm",
      Data: {
        title: "某市气象台发布暴雨黄色预警",
        effective: "2026/03/01 11:30",
        description: "预计未来3小时有强降雨",
        type: "11B03"
      }
    });

    expect(event?.eventId).toBe("某市气象台发布暴雨黄色预警_2026/03/01 11:30");
    expect(event?.shockTime).toBe("2026/03/01 11:30");
    expect(event?.placeName).toBe("某市气象台发布暴雨黄色预警");
    expect(event?.extra).toEqual({
      title: "某市气象台发布暴雨黄色预警",
      headline: "某市气象台发布暴雨黄色预警",
      description: "预计未来3小时有强降雨",
      warningType: "11B03"
    });
  });

  it("should accept bare Data frames on a single-source connection", () => {
    const usgs = new FanStudioAdapter(adapterContext(), { sourceType: "usgs" });
    const event = usgs.parse({ Data: { placeName: "Alaska Peninsula", shockTime: "2026-03-01 10:00:00", magnitude: 5 } });

    expect(event?.source).toBe("usgs");
    expect(event?.organization).toBe("美国地质调查局");
  });

  it("should ignore heartbeats, errors and malformed payloads", () => {
    expect(all.parseAll({ type: "heartbeat" })).toEqual([]);
    expect(all.parseAll({ type: "error", message: "rate limited" })).toEqual([]);
    expect(all.parseAll("not json")).toEqual([]);
    expect(all.parseAll(null)).toEqual([]);
    expect(all.parse({ type: "update", source: "cea" })).toBeNull();
  });
});
