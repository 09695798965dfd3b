import { unwatchFile, watchFile } from "node:fs";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { SystemModule } from "../types/module";
import { createLogger, errorMessage, type Logger } from "../utils/log";
import { DEFAULTS, type AppConfig } from "./defaults";

const color = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected a #RRGGBB colour");

const timezone = z.string().refine((zone) => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}, "unknown IANA timezone");

const positiveInt = z.number().int().positive();

const messageSchema = z.object({
  warningShockValiditySeconds: positiveInt.default(DEFAULTS.message.warningShockValiditySeconds),
  warningMinDisplaySeconds: positiveInt.default(DEFAULTS.message.warningMinDisplaySeconds),
  noActivityMessage: z.string().min(1).default(DEFAULTS.message.noActivityMessage),
  customText: z.string().default(DEFAULTS.message.customText),
  useCustomText: z.boolean().default(DEFAULTS.message.useCustomText),
  warningColor: color.default(DEFAULTS.message.warningColor),
  reportColor: color.default(DEFAULTS.message.reportColor),
  customTextColor: color.default(DEFAULTS.message.customTextColor),
  defaultColor: color.default(DEFAULTS.message.defaultColor),
  weatherColor: color.default(DEFAULTS.message.weatherColor)
});

const arbiterSchema = z.object({
  bufferCapacity: positiveInt.default(DEFAULTS.arbiter.bufferCapacity),
  queueCapacity: positiveInt.default(DEFAULTS.arbiter.queueCapacity),
  batchSize: positiveInt.default(DEFAULTS.arbiter.batchSize),
  tickMs: positiveInt.default(DEFAULTS.arbiter.tickMs),
  identityWindowSeconds: z.number().nonnegative().default(DEFAULTS.arbiter.identityWindowSeconds),
  identityPrefixLength: positiveInt.default(DEFAULTS.arbiter.identityPrefixLength)
});

const displaySchema = z.object({
  viewportWidth: positiveInt.default(DEFAULTS.display.viewportWidth),
  frameMs: positiveInt.default(DEFAULTS.display.frameMs),
  charsPerFrame: positiveInt.default(DEFAULTS.display.charsPerFrame),
  loadingMessage: z.string().min(1).default(DEFAULTS.display.loadingMessage),
  loadingColor: color.default(DEFAULTS.display.loadingColor)
});

const feedsSchema = z.object({
  websockets: z.array(z.string().url()).default([...DEFAULTS.feeds.websockets]),
  http: z.array(z.string().url()).default([...DEFAULTS.feeds.http]),
  fanStudioSources: z.array(z.string().min(1)).default([...DEFAULTS.feeds.fanStudioSources]),
  reconnect: z
    .object({
      maxAttempts: z.number().int().min(-1).default(DEFAULTS.feeds.reconnect.maxAttempts),
      stepSeconds: z.number().positive().default(DEFAULTS.feeds.reconnect.stepSeconds),
      maxDelaySeconds: z.number().positive().default(DEFAULTS.feeds.reconnect.maxDelaySeconds)
    })
    .default({}),
  polling: z
    .object({
      intervalMs: positiveInt.default(DEFAULTS.feeds.polling.intervalMs),
      eqlistIntervalMs: positiveInt.default(DEFAULTS.feeds.polling.eqlistIntervalMs),
      timeoutMs: positiveInt.default(DEFAULTS.feeds.polling.timeoutMs),
      attempts: positiveInt.default(DEFAULTS.feeds.polling.attempts),
      retryDelayMs: z.number().int().nonnegative().default(DEFAULTS.feeds.polling.retryDelayMs),
      errorLogIntervalMs: z.number().int().nonnegative().default(DEFAULTS.feeds.polling.errorLogIntervalMs)
    })
    .default({})
});

export const settingsSchema = z.object({
  timezone: timezone.default(DEFAULTS.timezone),
  message: messageSchema.default({}),
  arbiter: arbiterSchema.default({}),
  display: displaySchema.default({}),
  feeds: feedsSchema.default({}),
  resources: z
    .object({ weatherImagesDir: z.string().min(1).default(DEFAULTS.resources.weatherImagesDir) })
    .default({}),
  demo: z
    .object({
      enabled: z.boolean().default(DEFAULTS.demo.enabled),
      intervalMs: positiveInt.default(DEFAULTS.demo.intervalMs)
    })
    .default({}),
  ui: z
    .object({
      sampleMs: positiveInt.default(DEFAULTS.ui.sampleMs),
      logBuffer: positiveInt.default(DEFAULTS.ui.logBuffer)
    })
    .default({}),
  metrics: z
    .object({
      windowSec: positiveInt.default(DEFAULTS.metrics.windowSec),
      publishMs: positiveInt.default(DEFAULTS.metrics.publishMs)
    })
    .default({}),
  journal: z
    .object({
      enabled: z.boolean().default(DEFAULTS.journal.enabled),
      path: z.string().min(1).default(DEFAULTS.journal.path),
      flushMs: positiveInt.default(DEFAULTS.journal.flushMs)
    })
    .default({})
});

export type SettingsResult = { ok: true; config: AppConfig } | { ok: false; error: string };

export const DEFAULT_SETTINGS_PATH = "quake-ticker.json";

export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.QUAKE_TICKER_CONFIG ?? DEFAULT_SETTINGS_PATH;
}

export function parseSettings(raw: unknown): SettingsResult {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    return { ok: false, error: issues.join("; ") };
  }
  return { ok: true, config: parsed.data };
}

export function defaultSettings(): AppConfig {
  return settingsSchema.parse({});
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readSettings(path: string): Promise<SettingsResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return { ok: true, config: defaultSettings() };
    return { ok: false, error: errorMessage(error) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: `${path} is not valid JSON: ${errorMessage(error)}` };
  }
  return parseSettings(raw);
}

interface SettingsWatcherConfig {
  path: string;
  pollMs: number;
  debounceMs: number;
}

/**
 * Re-reads the settings file on change and hands validated configs to `onChange`.
 * Editors often write a file in several steps, so change notifications are coalesced for `debounceMs`.
 */
export class SettingsWatcher implements SystemModule {
  private readonly log: Logger;
  private reloadTimer?: ReturnType<typeof setTimeout>;
  private watching = false;

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: SettingsWatcherConfig,
    private readonly onChange: (config: AppConfig) => void
  ) {
    this.log = createLogger(registry, "settings");
  }

  start(): void {
    if (this.watching) return;
    this.watching = true;
    watchFile(this.config.path, { interval: this.config.pollMs }, this.handleFileChange);
  }

  stop(): void {
    if (!this.watching) return;
    this.watching = false;
    this.cancelScheduledReload();
    unwatchFile(this.config.path, this.handleFileChange);
  }

  /** Reloads once `debounceMs` has passed without another request. */
  scheduleReload(): void {
    this.cancelScheduledReload();
    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = undefined;
      this.reloadNow().catch((error: unknown) => {
        this.log.error(`Settings reload failed: ${errorMessage(error)}`);
      });
    }, this.config.debounceMs);
  }

  /** Reads and applies the file now; a reload still waiting on the debounce is dropped. */
  async reloadNow(): Promise<SettingsResult> {
    this.cancelScheduledReload();
    const result = await readSettings(this.config.path);
    if (!result.ok) {
      this.log.warn(`Settings rejected, keeping previous configuration: ${result.error}`);
      return result;
    }
    this.onChange(result.config);
    this.registry.emit("config.reloaded", { path: this.config.path, ts: Date.now() });
    this.log.info(`Settings reloaded from ${this.config.path}`);
    return result;
  }

  private cancelScheduledReload(): void {
    if (!this.reloadTimer) return;
    clearTimeout(this.reloadTimer);
    this.reloadTimer = undefined;
  }

  private readonly handleFileChange = (): void => {
    this.scheduleReload();
  };
}
