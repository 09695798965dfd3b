import React, { useEffect, useRef, useState } from "react";
import { Box, Text, useInput, useStdout } from "ink";
import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { CommandDefinition } from "../types/commands";
import type { BufferRow, DisplayMode } from "../types/display";
import type { DisplayDecision, DisplayFrame, LogEvent, MetricsSnapshot } from "../types/events";
import type { FeedConnectionEvent } from "../types/feed";
import { BufferPanel } from "./BufferPanel";
import { CommandPalette } from "./CommandPalette";
import { SourcesPanel } from "./SourcesPanel";
import { TickerPanel } from "./TickerPanel";

interface AppProps {
  registry: ModuleRegistry;
  commands: readonly CommandDefinition[];
  onCommand: (command: string) => Promise<void>;
  ui: {
    sampleMs: number;
    logBuffer: number;
  };
  feeds: readonly FeedConnectionEvent[];
}

const LOG_COLORS: Record<LogEvent["level"], string> = {
  DEBUG: "gray",
  INFO: "white",
  WARN: "yellow",
  ERROR: "red"
};

function feedKey(feed: FeedConnectionEvent): string {
  return `${feed.transport}:${feed.feedId}`;
}

export function App({ registry, commands, onCommand, ui, feeds: initialFeeds }: AppProps): React.JSX.Element {
  const { stdout } = useStdout();
  const contentWidth = Math.max(100, (stdout.columns ?? 120) - 1);
  const rowGap = 1;
  const halfWidth = Math.floor((contentWidth - rowGap) / 2);

  const [frame, setFrame] = useState<DisplayFrame | null>(null);
  const [decision, setDecision] = useState<DisplayDecision | null>(null);
  const [mode, setMode] = useState<DisplayMode>("idle");
  const [warnings, setWarnings] = useState<BufferRow[]>([]);
  const [reports, setReports] = useState<BufferRow[]>([]);
  const [feeds, setFeeds] = useState<FeedConnectionEvent[]>([...initialFeeds]);
  const [metrics, setMetrics] = useState<MetricsSnapshot | null>(null);
  const [logs, setLogs] = useState<LogEvent[]>([]);
  const [commandOpen, setCommandOpen] = useState(false);

  const latestFrameRef = useRef<DisplayFrame | null>(null);

  useEffect(() => {
    const unsubs: Array<() => void> = [];
    unsubs.push(
      registry.on("display.frame", (next) => {
        latestFrameRef.current = next;
      })
    );
    unsubs.push(
      registry.on("display.decision", (next) => {
        if (!next.accepted) return;
        setDecision(next);
        setMode(next.mode);
      })
    );
    unsubs.push(
      registry.on("buffer.snapshot", (snapshot) => {
        setMode(snapshot.mode);
        setWarnings(snapshot.warnings);
        setReports(snapshot.reports);
      })
    );
    unsubs.push(
      registry.on("feed.connection", (evt) => {
        setFeeds((prev) => {
          const index = prev.findIndex((feed) => feedKey(feed) === feedKey(evt));
          if (index === -1) return [...prev, evt];
          const next = [...prev];
          next[index] = evt;
          return next;
        });
      })
    );
    unsubs.push(registry.on("metrics.updated", setMetrics));
    unsubs.push(
      registry.on("log", (line) => {
        if (line.level === "DEBUG") return;
        setLogs((prev) => {
          const next = [...prev, line];
          return next.length > ui.logBuffer ? next.slice(next.length - ui.logBuffer) : next;
        });
      })
    );

    // The marquee advances every frame; sampling keeps re-renders bounded.
    const frameSampler = setInterval(() => setFrame(latestFrameRef.current), ui.sampleMs);

    return () => {
      clearInterval(frameSampler);
      for (const unsub of unsubs) unsub();
    };
  }, [registry, ui.logBuffer, ui.sampleMs]);

  useInput((input) => {
    if (commandOpen) return;
    if (input === "/" || input === "\\") setCommandOpen(true);
  });

  const connected = feeds.filter((feed) => feed.state === "connected").length;

  return (
    <Box flexDirection="column" width={contentWidth}>
      <Text color="cyan">
        Quake Ticker | Mode: {mode.toUpperCase()} | Warnings: {warnings.length} | Reports: {reports.length} | Feeds:{" "}
        {connected}/{feeds.length}
      </Text>
      <Text color="gray">
        Events/s: {(metrics?.eventsPerSec ?? 0).toFixed(2)} | Ingested: {metrics?.ingested ?? 0} | Dropped:{" "}
        {metrics?.queueDropped ?? 0} | Rejected: {metrics?.admissionRejected ?? 0} | Switches:{" "}
        {metrics?.displaySwitches ?? 0} | Cmd p50/p99: {(metrics?.commandP50Ms ?? 0).toFixed(2)}/
        {(metrics?.commandP99Ms ?? 0).toFixed(2)} ms
      </Text>

      <TickerPanel frame={frame} decision={decision} mode={mode} width={contentWidth} />

      <Box width={contentWidth}>
        <Box width={halfWidth} marginRight={rowGap}>
          <BufferPanel title="Warnings" rows={warnings} borderColor="red" emptyText="No live warnings" />
        </Box>
        <Box width={contentWidth - rowGap - halfWidth}>
          <BufferPanel title="Reports" rows={reports} borderColor="cyan" emptyText="Waiting for reports..." />
        </Box>
      </Box>

      <Box width={contentWidth}>
        <Box width={halfWidth} marginRight={rowGap}>
          <SourcesPanel feeds={feeds} />
        </Box>
        <Box width={contentWidth - rowGap - halfWidth}>
          <Box borderStyle="round" borderColor="yellow" flexDirection="column" paddingX={1} minHeight={8}>
            <Text color="yellow">Logs</Text>
            {logs.slice(-6).map((line, idx) => (
              <Text key={`${line.ts}_${idx}`} color={LOG_COLORS[line.level]} wrap="truncate">
                [{new Date(line.ts).toISOString().slice(11, 19)}] {line.level} {line.scope}: {line.message}
              </Text>
            ))}
          </Box>
        </Box>
      </Box>

      <CommandPalette
        isOpen={commandOpen}
        commands={commands}
        onClose={() => setCommandOpen(false)}
        onExecute={(cmd) => void onCommand(cmd)}
      />

      <Text color="gray">/ or \ open palette | /simulate-warning /simulate-report /custom-text /reload /status | Ctrl+C quit</Text>
    </Box>
  );
}
