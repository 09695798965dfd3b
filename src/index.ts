import React from "react";
import { render } from "ink";
import { resolveFeed, type ResolveOptions } from "./adapters/resolveFeed";
import type { AdapterContext } from "./adapters/types";
import { ModuleRegistry } from "./boot/moduleRegistry";
import { defaultSettings, readSettings, resolveSettingsPath, SettingsWatcher } from "./config/settings";
import { createOrganizationLookup, createPriorityLookup } from "./config/sourceTables";
import { DisplayArbiter } from "./core/displayArbiter";
import { ScrollingSink } from "./display/scrollingSink";
import { EventJournal } from "./modules/eventJournal";
import { HttpPollingFeed } from "./modules/httpPollingFeed";
import { MetricsModule } from "./modules/metricsModule";
import { SimulatedFeed } from "./modules/simulatedFeed";
import { type IngestFn, WebSocketFeed } from "./modules/websocketFeed";
import { WeatherImageLoader } from "./resources/weatherImageLoader";
import type { FeedConnectionEvent } from "./types/feed";
import type { FeedModule } from "./types/module";
import { App } from "./ui/App";
import { COMMANDS, createCommandRunner } from "./ui/commandRunner";
import { createLogger, errorMessage } from "./utils/log";

const SETTINGS_POLL_MS = 1000;
const SETTINGS_DEBOUNCE_MS = 300;

async function bootstrap(): Promise<void> {
  const settingsPath = resolveSettingsPath();
  const loaded = await readSettings(settingsPath);
  const config = loaded.ok ? loaded.config : defaultSettings();

  const registry = new ModuleRegistry();
  const log = createLogger(registry, "boot");

  const sink = new ScrollingSink(registry, config.display);
  const arbiter = new DisplayArbiter(
    registry,
    { timezone: config.timezone, message: config.message, arbiter: config.arbiter },
    {
      sink,
      priorityOf: createPriorityLookup(),
      resources: new WeatherImageLoader(config.resources.weatherImagesDir, createLogger(registry, "resources"))
    }
  );

  const ingest: IngestFn = (sourceName, event) => {
    arbiter.submit(sourceName, event);
  };

  const organizationOf = createOrganizationLookup();
  const adapterContext: AdapterContext = { zone: config.timezone, organizationOf, now: Date.now };
  const resolveOptions: ResolveOptions = { fanStudioSources: config.feeds.fanStudioSources };

  const feeds: FeedModule[] = [];
  const skipped: string[] = [];

  for (const url of config.feeds.websockets) {
    const resolved = resolveFeed(url, adapterContext, resolveOptions);
    if (resolved) feeds.push(new WebSocketFeed(registry, { url, reconnect: config.feeds.reconnect }, resolved, ingest));
    else skipped.push(url);
  }

  for (const url of config.feeds.http) {
    const resolved = resolveFeed(url, adapterContext, resolveOptions);
    if (resolved) feeds.push(new HttpPollingFeed(registry, { url, polling: config.feeds.polling }, resolved, ingest));
    else skipped.push(url);
  }

  const initialFeeds = feeds.map((feed): FeedConnectionEvent => ({
    feedId: feed.feedId,
    url: feed.url,
    transport: feed.transport,
    state: "connecting",
    ts: Date.now()
  }));

  const simulator = new SimulatedFeed(
    registry,
    { enabled: config.demo.enabled, intervalMs: config.demo.intervalMs, timezone: config.timezone },
    ingest,
    { organizationOf }
  );

  const watcher = new SettingsWatcher(
    registry,
    { path: settingsPath, pollMs: SETTINGS_POLL_MS, debounceMs: SETTINGS_DEBOUNCE_MS },
    (next) => arbiter.applyMessageConfig(next.message)
  );

  const metrics = new MetricsModule(registry, {
    windowSec: config.metrics.windowSec,
    publishMs: config.metrics.publishMs
  });

  const journal = new EventJournal(registry, {
    enabled: config.journal.enabled,
    path: config.journal.path,
    flushMs: config.journal.flushMs
  });

  // Started in this order; stopAll runs in reverse so the journal captures the shutdown.
  registry.register("journal", journal);
  registry.register("metrics", metrics);
  registry.register("sink", sink);
  registry.register("arbiter", arbiter);
  registry.register("settings", watcher);
  registry.register("simulated", simulator);
  feeds.forEach((feed, index) => registry.register(`feed:${index}:${feed.feedId}`, feed));

  const runCommand = createCommandRunner({
    registry,
    arbiter,
    simulator,
    reloadSettings: () => watcher.reloadNow()
  });

  const ink = render(
    React.createElement(App, { registry, commands: COMMANDS, onCommand: runCommand, ui: config.ui, feeds: initialFeeds })
  );

  await registry.startAll();

  if (!loaded.ok) log.warn(`Settings rejected, using defaults: ${loaded.error}`);
  for (const url of skipped) log.warn(`No adapter for ${url}, feed skipped`);
  log.info(`Started ${feeds.length} feed(s), display zone ${config.timezone}`);

  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info("Shutting down...");
    await registry.stopAll();
    ink.unmount();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      process.stderr.write(`Shutdown failed: ${errorMessage(error)}\n`);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  // Ink consumes Ctrl+C in raw mode and exits the render instead of raising SIGINT.
  void ink.waitUntilExit().then(onSignal, onSignal);
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Startup failed: ${errorMessage(error)}\n`);
  process.exit(1);
});
