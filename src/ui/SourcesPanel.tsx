import React from "react";
import { Box, Text } from "ink";
import type { ConnectionState, FeedConnectionEvent } from "../types/feed";

interface SourcesPanelProps {
  feeds: readonly FeedConnectionEvent[];
}

const STATE_COLORS: Record<ConnectionState, string> = {
  connected: "green",
  connecting: "yellow",
  reconnecting: "yellow",
  disconnected: "red",
  paused: "magenta"
};

export function SourcesPanel({ feeds }: SourcesPanelProps): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor="blue" flexDirection="column" paddingX={1} minHeight={8}>
      <Text color="blue">Sources</Text>
      {feeds.slice(0, 6).map((feed) => (
        <Text key={`${feed.transport}:${feed.feedId}`} wrap="truncate">
          <Text color={STATE_COLORS[feed.state]}>{feed.state.toUpperCase().padEnd(13)}</Text>
          {feed.transport.padEnd(10)} {feed.feedId}
          {feed.message ? <Text color="gray"> {feed.message}</Text> : null}
        </Text>
      ))}
      {feeds.length === 0 ? <Text color="yellow">No feeds configured</Text> : null}
    </Box>
  );
}
