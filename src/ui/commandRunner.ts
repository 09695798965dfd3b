import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { SettingsResult } from "../config/settings";
import type { DisplayArbiter } from "../core/displayArbiter";
import type { SimulatedFeed } from "../modules/simulatedFeed";
import type { CommandDefinition } from "../types/commands";
import { createLogger, errorMessage } from "../utils/log";

export interface CommandContext {
  registry: ModuleRegistry;
  arbiter: Pick<DisplayArbiter, "applyMessageConfig" | "messageConfig" | "describe">;
  simulator: Pick<SimulatedFeed, "simulateWarning" | "simulateReport" | "simulateWeather" | "simulateCancel">;
  reloadSettings: () => Promise<SettingsResult>;
}

export const COMMANDS: readonly CommandDefinition[] = [
  { id: "sim-warning", label: "Simulate Warning", command: "/simulate-warning cea", description: "Inject an early warning" },
  { id: "sim-report", label: "Simulate Report", command: "/simulate-report cenc", description: "Inject a quake report" },
  { id: "sim-weather", label: "Simulate Weather", command: "/simulate-weather", description: "Inject a weather alert" },
  { id: "sim-cancel", label: "Cancel Warning", command: "/simulate-cancel", description: "Cancel the last simulated warning" },
  { id: "custom-on", label: "Custom Text On", command: "/custom-text on", description: "Pin custom text in report mode" },
  { id: "custom-off", label: "Custom Text Off", command: "/custom-text off", description: "Resume report rotation" },
  { id: "reload", label: "Reload Settings", command: "/reload", description: "Re-read the settings file" },
  { id: "status", label: "Status", command: "/status", description: "Log arbiter state" }
];

export type CommandRunner = (raw: string) => Promise<void>;

export function createCommandRunner(ctx: CommandContext): CommandRunner {
  const { registry, arbiter, simulator } = ctx;
  const log = createLogger(registry, "command");

  const setCustomText = (toggle: string | undefined, text: string): void => {
    const current = arbiter.messageConfig();
    if (toggle === "on") {
      arbiter.applyMessageConfig({ ...current, useCustomText: true, customText: text || current.customText });
    } else if (toggle === "off") {
      arbiter.applyMessageConfig({ ...current, useCustomText: false });
    } else {
      throw new Error("Usage: /custom-text on|off [text]");
    }
  };

  return async (raw) => {
    const started = performance.now();
    const command = raw.trim();
    if (!command) return;
    const parts = command.startsWith("/") ? command.slice(1).split(/\s+/) : command.split(/\s+/);
    const action = parts[0]?.toLowerCase();

    try {
      if (action === "simulate-warning") {
        simulator.simulateWarning(parts[1] || undefined);
      } else if (action === "simulate-report") {
        simulator.simulateReport(parts[1] || undefined);
      } else if (action === "simulate-weather") {
        simulator.simulateWeather();
      } else if (action === "simulate-cancel") {
        simulator.simulateCancel();
      } else if (action === "custom-text") {
        setCustomText(parts[1]?.toLowerCase(), parts.slice(2).join(" "));
      } else if (action === "reload") {
        await ctx.reloadSettings();
      } else if (action === "status") {
        log.info(arbiter.describe());
      } else {
        log.warn(`Unknown command: ${command}`);
      }
    } catch (error) {
      log.error(errorMessage(error));
    } finally {
      registry.emit("command.latency", { command, ms: performance.now() - started, ts: Date.now() });
    }
  };
}
