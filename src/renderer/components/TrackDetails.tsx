import type { JSX } from "react";
import { Box, Text } from "ink";
import { formatDuration } from "../../shared/format.js";
import type { Track } from "../../shared/types.js";
import { coverDescription } from "../metadata-utils.js";

interface TrackDetailsProps {
  track: Track | null;
  height: number;
}

export function TrackDetails({ track, height }: TrackDetailsProps): JSX.Element {
  const fields: Array<[string, string]> = track && !track.placeholder
    ? [
        ["Title", track.title],
        ["Artist", track.artist],
        ["Album", track.album],
        ["Length", formatDuration(track.durationSec)],
        ["Cover", coverDescription(track.cover)],
        ["File", track.path]
      ]
    : [];

  return (
    <Box flexDirection="column" borderStyle="round" height={height} paddingX={1}>
      <Text bold>Details</Text>
      {fields.length === 0 ? <Text dimColor>No song selected</Text> : null}
      {fields.map(([label, value]) => (
        <Text key={label} wrap="truncate-end">
          <Text dimColor>{`${label}: `}</Text>
          {value}
        </Text>
      ))}
    </Box>
  );
}
