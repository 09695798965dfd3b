import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ModuleRegistry } from "../boot/moduleRegistry";
import { DEFAULTS } from "./defaults";
import { defaultSettings, readSettings, resolveSettingsPath, SettingsWatcher } from "./settings";

describe("readSettings", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "settings-"));
    path = join(dir, "quake-ticker.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should fall back to defaults when the file does not exist", async () => {
    const result = await readSettings(path);

    expect(result).toEqual({ ok: true, config: defaultSettings() });
  });

  it("should merge a partial file over the defaults", async () => {
    await writeFile(path, JSON.stringify({ message: { customText: "测试文本", useCustomText: true } }));

    const result = await readSettings(path);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.message.customText).toBe("测试文本");
    expect(result.config.message.useCustomText).toBe(true);
    expect(result.config.message.warningColor).toBe(DEFAULTS.message.warningColor);
    expect(result.config.timezone).toBe(DEFAULTS.timezone);
  });

  it("should reject a malformed colour with its field path", async () => {
    await writeFile(path, JSON.stringify({ message: { warningColor: "red" } }));

    expect(await readSettings(path)).toEqual({
      ok: false,
      error: "message.warningColor: expected a #RRGGBB colour"
    });
  });

  it("should reject a file that is not JSON", async () => {
    await writeFile(path, "{ message: ");

    const result = await readSettings(path);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.startsWith(`${path} is not valid JSON: `)).toBe(true);
  });

  it("should take the settings path from the environment", () => {
    expect(resolveSettingsPath({ QUAKE_TICKER_CONFIG: "/etc/quake.json" })).toBe("/etc/quake.json");
    expect(resolveSettingsPath({})).toBe("quake-ticker.json");
  });
});

describe("SettingsWatcher", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "watcher-"));
    path = join(dir, "quake-ticker.json");
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(dir, { recursive: true, force: true });
  });

  it("should coalesce a burst of change notifications into one reload", async () => {
    vi.useFakeTimers();
    const watcher = new SettingsWatcher(new ModuleRegistry(), { path, pollMs: 1000, debounceMs: 300 }, () => undefined);
    const reload = vi.spyOn(watcher, "reloadNow").mockResolvedValue({ ok: true, config: defaultSettings() });

    watcher.scheduleReload();
    await vi.advanceTimersByTimeAsync(200);
    watcher.scheduleReload();
    watcher.scheduleReload();
    await vi.advanceTimersByTimeAsync(299);
    expect(reload).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(reload).toHaveBeenCalledTimes(1);
  });

  it("should apply a valid file and drop the reload still waiting on the debounce", async () => {
    await writeFile(path, JSON.stringify({ message: { noActivityMessage: "暂无地震信息" } }));
    const onChange = vi.fn();
    const watcher = new SettingsWatcher(new ModuleRegistry(), { path, pollMs: 1000, debounceMs: 10 }, onChange);

    watcher.scheduleReload();
    const result = await watcher.reloadNow();
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(result.ok).toBe(true);
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith(
      expect.objectContaining({ message: expect.objectContaining({ noActivityMessage: "暂无地震信息" }) })
    );
  });

  it("should keep the previous configuration when the file is rejected", async () => {
    await writeFile(path, JSON.stringify({ arbiter: { batchSize: 0 } }));
    const onChange = vi.fn();
    const watcher = new SettingsWatcher(new ModuleRegistry(), { path, pollMs: 1000, debounceMs: 10 }, onChange);

    const result = await watcher.reloadNow();

    expect(result.ok).toBe(false);
    expect(onChange).not.toHaveBeenCalled();
  });
});
