import type { JSX } from "react";
import { Box, Text } from "ink";
import { KEY_BINDING_HELP } from "../key-bindings.js";

interface HelpPopupProps {
  height: number;
}

export function HelpPopup({ height }: HelpPopupProps): JSX.Element {
  const keyWidth = Math.max(...KEY_BINDING_HELP.map((entry) => entry.keys.length)) + 2;

  return (
    <Box flexDirection="column" borderStyle="double" borderColor="cyan" height={height} paddingX={1} flexGrow={1}>
      <Text bold>Keys (Esc to close)</Text>
      {KEY_BINDING_HELP.slice(0, Math.max(0, height - 3)).map((entry) => (
        <Text key={entry.keys} wrap="truncate-end">
          <Text color="cyan">{entry.keys.padEnd(keyWidth)}</Text>
          {entry.action}
        </Text>
      ))}
    </Box>
  );
}
