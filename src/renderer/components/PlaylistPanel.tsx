import { memo, type JSX } from "react";
import { Box, Text } from "ink";

interface PlaylistPanelProps {
  playlists: string[];
  activeIndex: number;
  offset: number;
  capacity: number;
  height: number;
}

function PlaylistPanelComponent({ playlists, activeIndex, offset, capacity, height }: PlaylistPanelProps): JSX.Element {
  const rows = playlists.slice(offset, offset + capacity);

  return (
    <Box flexDirection="column" borderStyle="round" height={height} paddingX={1}>
      <Text bold>Playlists</Text>
      {rows.map((name, row) => {
        const active = offset + row === activeIndex;
        return (
          <Text key={name} inverse={active} wrap="truncate-end">
            {name}
          </Text>
        );
      })}
    </Box>
  );
}

export const PlaylistPanel = memo(PlaylistPanelComponent);
