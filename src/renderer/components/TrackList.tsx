import { memo, type JSX } from "react";
import { Box, Text } from "ink";
import { formatDuration } from "../../shared/format.js";
import type { PlaybackStatus, SortCriteria, Track } from "../../shared/types.js";
import { sortLabel, trackSummary } from "../metadata-utils.js";

interface TrackListProps {
  playlistName: string;
  tracks: Track[];
  selectedTrackId: string | null;
  currentTrackId: string | null;
  playbackStatus: PlaybackStatus;
  chosenTrackIds: string[];
  sortCriteria: SortCriteria;
  offset: number;
  capacity: number;
  height: number;
}

export function playingMarker(track: Track, currentTrackId: string | null, status: PlaybackStatus): string {
  if (track.isPlaying) {
    return "▶";
  }
  return status === "paused" && track.id === currentTrackId ? "‖" : " ";
}

function TrackListComponent({
  playlistName,
  tracks,
  selectedTrackId,
  currentTrackId,
  playbackStatus,
  chosenTrackIds,
  sortCriteria,
  offset,
  capacity,
  height
}: TrackListProps): JSX.Element {
  const chosen = new Set(chosenTrackIds);
  const rows = tracks.slice(offset, offset + capacity);

  return (
    <Box flexDirection="column" borderStyle="round" height={height} flexGrow={1} paddingX={1}>
      <Box justifyContent="space-between">
        <Text bold wrap="truncate-end">{`${playlistName} (${tracks.length})`}</Text>
        <Text dimColor>{`Sort: ${sortLabel(sortCriteria)}`}</Text>
      </Box>
      {rows.map((track) => (
        <Box key={track.id} justifyContent="space-between">
          <Text inverse={track.id === selectedTrackId} wrap="truncate-end">
            {`${playingMarker(track, currentTrackId, playbackStatus)}${chosen.has(track.id) ? "+" : " "} ${trackSummary(track)}`}
          </Text>
          <Text dimColor>{` ${formatDuration(track.durationSec)}`}</Text>
        </Box>
      ))}
    </Box>
  );
}

export const TrackList = memo(TrackListComponent);
