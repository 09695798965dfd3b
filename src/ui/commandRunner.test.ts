import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { ModuleRegistry } from "../boot/moduleRegistry";
import { DEFAULTS, type MessageConfig } from "../config/defaults";
import type { SettingsResult } from "../config/settings";
import { flushBus, quakeEvent } from "../testing/fixtures";
import type { LogEvent } from "../types/events";
import type { QuakeEvent } from "../types/quake";
import { type CommandContext, createCommandRunner } from "./commandRunner";

describe("createCommandRunner", () => {
  let registry: ModuleRegistry;
  let logs: LogEvent[];
  let latencies: string[];
  let applied: MessageConfig[];
  let ctx: CommandContext;
  let simulateWarning: Mock<(source?: string) => QuakeEvent>;
  let reloadSettings: Mock<() => Promise<SettingsResult>>;

  beforeEach(() => {
    registry = new ModuleRegistry();
    logs = [];
    latencies = [];
    applied = [];
    registry.on("log", (line) => logs.push(line));
    registry.on("command.latency", (evt) => latencies.push(evt.command));

    simulateWarning = vi.fn((source?: string) => quakeEvent({ type: "warning", source: source ?? "cea" }));
    reloadSettings = vi.fn(async (): Promise<SettingsResult> => ({ ok: false, error: "bad settings" }));
    ctx = {
      registry,
      arbiter: {
        applyMessageConfig: (next) => applied.push(next),
        messageConfig: () => DEFAULTS.message,
        describe: () => "mode=idle current=none warnings=0 reports=0 queued=0"
      },
      simulator: {
        simulateWarning,
        simulateReport: (source?: string) => quakeEvent({ source: source ?? "cenc" }),
        simulateWeather: () => quakeEvent({ type: "weather", source: "weatheralarm" }),
        simulateCancel: () => null
      },
      reloadSettings
    };
  });

  it("should pass an optional source to the simulator", async () => {
    const run = createCommandRunner(ctx);

    await run("/simulate-warning jma");
    await run("/simulate-warning");

    expect(simulateWarning.mock.calls).toEqual([["jma"], [undefined]]);
  });

  it("should toggle custom text with an optional message", async () => {
    const run = createCommandRunner(ctx);

    await run("/custom-text on 今日 演练");
    await run("/custom-text ON");
    await run("/custom-text off");

    expect(applied).toEqual([
      { ...DEFAULTS.message, useCustomText: true, customText: "今日 演练" },
      { ...DEFAULTS.message, useCustomText: true, customText: DEFAULTS.message.customText },
      { ...DEFAULTS.message, useCustomText: false }
    ]);
  });

  it("should log usage errors without applying anything", async () => {
    await createCommandRunner(ctx)("/custom-text maybe");
    await flushBus();

    expect(applied).toEqual([]);
    expect(logs).toEqual([expect.objectContaining({ level: "ERROR", message: "Usage: /custom-text on|off [text]" })]);
  });

  it("should warn about unknown commands", async () => {
    await createCommandRunner(ctx)("/launch");
    await flushBus();

    expect(logs).toEqual([expect.objectContaining({ level: "WARN", message: "Unknown command: /launch" })]);
  });

  it("should reload settings on demand", async () => {
    await createCommandRunner(ctx)("/reload");
    expect(reloadSettings).toHaveBeenCalledTimes(1);
  });

  it("should log the arbiter state and its latency for /status", async () => {
    await createCommandRunner(ctx)("  /status ");
    await flushBus();

    expect(logs).toEqual([
      expect.objectContaining({
        level: "INFO",
        scope: "command",
        message: "mode=idle current=none warnings=0 reports=0 queued=0"
      })
    ]);
    expect(latencies).toEqual(["/status"]);
  });

  it("should ignore blank input", async () => {
    await createCommandRunner(ctx)("   ");
    await flushBus();

    expect(logs).toEqual([]);
    expect(latencies).toEqual([]);
  });
});
