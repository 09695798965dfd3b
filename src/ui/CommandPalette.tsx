import React, { useEffect, useMemo, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { CommandDefinition } from "../types/commands";

interface CommandPaletteProps {
  isOpen: boolean;
  commands: readonly CommandDefinition[];
  onClose: () => void;
  onExecute: (command: string) => void;
}

/** Text typed after the command word is passed through as arguments. */
function commandWord(query: string): string {
  return (query.trim().split(/\s+/)[0] ?? "").replace(/^\//, "").toLowerCase();
}

export function CommandPalette({
  isOpen,
  commands,
  onClose,
  onExecute
}: CommandPaletteProps): React.JSX.Element | null {
  const [query, setQuery] = useState("");
  const [selected, setSelected] = useState(0);

  const filtered = useMemo(() => {
    const word = commandWord(query);
    if (!word) return commands;
    return commands.filter((cmd) => `${cmd.id} ${cmd.command} ${cmd.label}`.toLowerCase().includes(word));
  }, [commands, query]);

  useEffect(() => setSelected(0), [query]);

  useInput((input, key) => {
    if (!isOpen) return;
    if (key.escape) {
      setQuery("");
      return onClose();
    }
    if (key.upArrow) return setSelected((prev) => (prev <= 0 ? Math.max(filtered.length - 1, 0) : prev - 1));
    if (key.downArrow) return setSelected((prev) => (filtered.length === 0 ? 0 : (prev + 1) % filtered.length));

    if (key.tab) {
      const selectedCmd = filtered[selected];
      if (selectedCmd) setQuery(`${selectedCmd.command.split(" ")[0] ?? ""} `);
      return;
    }

    if (key.return) {
      const typed = query.trim();
      const text = typed.includes(" ") || filtered.length === 0 ? typed : filtered[selected]?.command ?? typed;
      if (text) onExecute(text.startsWith("/") ? text : `/${text}`);
      setQuery("");
      onClose();
      return;
    }

    if (key.backspace || key.delete) return setQuery((prev) => prev.slice(0, -1));

    if (input && !key.ctrl && !key.meta) {
      if (query.length === 0 && (input === "/" || input === "\\")) return;
      setQuery((prev) => prev + input);
    }
  });

  if (!isOpen) return null;

  return (
    <Box borderStyle="round" borderColor="cyan" flexDirection="column" paddingX={1} marginTop={1}>
      <Text color="cyan">Commands</Text>
      <Text>/ {query || "<type a command, Tab to complete>"}</Text>
      <Box flexDirection="column" marginTop={1}>
        {filtered.slice(0, 8).map((cmd, index) => {
          const active = index === selected;
          return (
            <Text key={cmd.id} color={active ? "green" : "white"}>
              {active ? ">" : " "} {cmd.command.padEnd(24)} {cmd.description}
            </Text>
          );
        })}
      </Box>
      <Text color="gray">Esc close | Arrows navigate | Tab complete | Enter execute</Text>
    </Box>
  );
}
