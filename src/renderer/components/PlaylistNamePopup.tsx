import type { JSX } from "react";
import { Box, Text } from "ink";
import type { PlaylistInputSnapshot } from "../../shared/types.js";

interface PlaylistNamePopupProps {
  input: PlaylistInputSnapshot;
  chosenCount: number;
}

export function PlaylistNamePopup({ input, chosenCount }: PlaylistNamePopupProps): JSX.Element {
  return (
    <Box flexDirection="column" borderStyle="double" borderColor="yellow" paddingX={1}>
      <Text bold>{`New playlist with ${chosenCount} song${chosenCount === 1 ? "" : "s"}`}</Text>
      {input.error ? (
        <Text color="red">{input.error}</Text>
      ) : (
        <Text>
          <Text dimColor>Name: </Text>
          {input.text}
          <Text color="yellow">_</Text>
        </Text>
      )}
      <Text dimColor>Enter to create, Esc to cancel</Text>
    </Box>
  );
}
