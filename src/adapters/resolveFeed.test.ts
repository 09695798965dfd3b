import { describe, expect, it } from "vitest";
import { adapterContext } from "../testing/fixtures";
import { resolveFeed, routeFeed } from "./resolveFeed";

describe("routeFeed", () => {
  it.each([
    ["wss://ws.fanstudio.tech/all", { family: "fanstudio", sourceType: "all" }],
    ["wss://ws.fanstudio.hk/cenc", { family: "fanstudio", sourceType: "cenc" }],
    ["wss://ws-api.wolfx.jp/all_eew", { family: "wolfx", sourceType: "all_eew" }],
    ["https://api.wolfx.jp/cenc_eqlist.json", { family: "wolfx", sourceType: "cenc_eqlist" }],
    ["wss://sismotide.top/nied", { family: "nied", sourceType: "nied" }],
    ["https://api.p2pquake.net/v2/history?codes=551&limit=3", { family: "p2pquake", sourceType: "p2pquake" }],
    ["https://api.p2pquake.net/v2/jma/tsunami?limit=1", { family: "p2pquake_tsunami", sourceType: "p2pquake_tsunami" }],
    ["wss://relay.example.org/feeds/custom", { family: "fanstudio", sourceType: "custom" }]
  ])("should route %s", (url, expected) => {
    expect(routeFeed(url)).toEqual(expected);
  });

  it("should not route unknown HTTP endpoints or invalid URLs", () => {
    expect(routeFeed("https://example.org/data.json")).toBeNull();
    expect(routeFeed("not a url")).toBeNull();
  });
});

describe("resolveFeed", () => {
  it("should build the adapter for the route", () => {
    const resolved = resolveFeed("https://api.wolfx.jp/sc_eew.json", adapterContext());
    expect(resolved?.adapter.family).toBe("wolfx");
    expect(resolved?.sourceType).toBe("sc_eew");
  });
});
