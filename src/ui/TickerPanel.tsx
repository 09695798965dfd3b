import React from "react";
import { Box, Text } from "ink";
import type { DisplayMode } from "../types/display";
import type { DisplayDecision, DisplayFrame } from "../types/events";

interface TickerPanelProps {
  frame: DisplayFrame | null;
  decision: DisplayDecision | null;
  mode: DisplayMode;
  width: number;
}

const MODE_COLORS: Record<DisplayMode, string> = {
  idle: "gray",
  report: "cyan",
  warning: "red"
};

function progressBar(progress: number, width: number): string {
  const filled = Math.max(0, Math.min(width, Math.round(progress * width)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

function imageName(imageRef: string): string {
  return imageRef.split(/[\\/]/).pop() ?? imageRef;
}

export function TickerPanel({ frame, decision, mode, width }: TickerPanelProps): React.JSX.Element {
  return (
    <Box borderStyle="double" borderColor={MODE_COLORS[mode]} flexDirection="column" paddingX={1} width={width}>
      <Text color={MODE_COLORS[mode]}>
        Ticker [{mode.toUpperCase()}]
        {decision ? ` ${decision.messageType}:${decision.source}${decision.forced ? " (forced)" : ""}` : ""}
      </Text>
      <Text color={frame?.color ?? "gray"} wrap="truncate">
        {frame ? frame.visible : " "}
      </Text>
      <Text color="gray">
        {progressBar(frame?.progress ?? 0, 24)}
        {frame?.imageRef ? `  image: ${imageName(frame.imageRef)}` : ""}
      </Text>
    </Box>
  );
}
