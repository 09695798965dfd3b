import React from "react";
import { Box, Text } from "ink";
import type { BufferRow } from "../types/display";

interface BufferPanelProps {
  title: string;
  rows: readonly BufferRow[];
  borderColor: string;
  emptyText: string;
}

export function BufferPanel({ title, rows, borderColor, emptyText }: BufferPanelProps): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor={borderColor} flexDirection="column" paddingX={1} minHeight={8}>
      <Text color={borderColor}>
        {title} ({rows.length})
      </Text>
      {rows.slice(0, 6).map((row, index) => (
        <Text key={row.id} color={row.current ? "green" : "white"} wrap="truncate">
          {row.current ? ">" : " "} {String(index + 1).padStart(2)} {row.source.padEnd(16)} {row.text}
        </Text>
      ))}
      {rows.length === 0 ? <Text color="gray">{emptyText}</Text> : null}
    </Box>
  );
}
