import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ModuleRegistry } from "../boot/moduleRegistry";
import { quakeEvent } from "../testing/fixtures";
import { createLogger } from "../utils/log";
import { WeatherImageLoader, weatherImageCandidates } from "./weatherImageLoader";

describe("weatherImageCandidates", () => {
  it("should build the file name from the headline", () => {
    expect(weatherImageCandidates("广东省阳江市发布暴雨橙色预警信号", "")).toEqual(["暴雨橙色预警.jpg"]);
  });

  it("should strip a leading qualifier from a description type", () => {
    expect(weatherImageCandidates("某地发布大雾预警", "高速公路大雾蓝色预警，请注意行车安全")).toEqual([
      "大雾蓝色预警.jpg"
    ]);
  });

  it("should borrow the headline colour for a graded description", () => {
    expect(weatherImageCandidates("某市发布寒潮黄色预警", "道路结冰Ⅲ级预警")).toEqual([
      "寒潮黄色预警.jpg",
      "道路结冰黄色预警.jpg"
    ]);
  });

  it("should return nothing when no colour can be found", () => {
    expect(weatherImageCandidates("某市气象台更新预警", "大风预警")).toEqual([]);
  });
});

describe("WeatherImageLoader", () => {
  let dir: string;
  let loader: WeatherImageLoader;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "weather-signals-"));
    loader = new WeatherImageLoader(dir, createLogger(new ModuleRegistry(), "resources"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function weather(headline: string, description: string) {
    return quakeEvent({ type: "weather", source: "weatheralarm", extra: { headline, description } });
  }

  it("should resolve to the first candidate that exists", async () => {
    await writeFile(join(dir, "道路结冰黄色预警.jpg"), "");

    const ref = await loader.resolveWeatherImage(weather("某市发布寒潮黄色预警", "道路结冰Ⅲ级预警"));
    expect(ref).toBe(join(dir, "道路结冰黄色预警.jpg"));
  });

  it("should resolve to undefined when no image exists", async () => {
    expect(await loader.resolveWeatherImage(weather("某市发布暴雨红色预警", ""))).toBeUndefined();
  });

  it("should skip events without a headline", async () => {
    expect(await loader.resolveWeatherImage(weather("", "暴雨红色预警"))).toBeUndefined();
  });
});
