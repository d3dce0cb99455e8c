import { memo, type JSX } from "react";
import { Box, Text } from "ink";
import { formatGauge, formatProgress, formatVolume, ratio } from "../../shared/format.js";
import { PLAYER_BAR_HEIGHT } from "../../shared/layout.js";
import type { PlaybackSnapshot, Track } from "../../shared/types.js";
import { PROGRESS_GAUGE_WIDTH, VOLUME_GAUGE_WIDTH } from "../app-defaults.js";
import { trackSummary } from "../metadata-utils.js";

interface PlayerBarProps {
  playback: PlaybackSnapshot;
  nowPlaying: Track | null;
}

const STATUS_ICONS = {
  idle: "■",
  playing: "▶",
  paused: "‖"
} as const;

function PlayerBarComponent({ playback, nowPlaying }: PlayerBarProps): JSX.Element {
  const title = nowPlaying ? trackSummary(nowPlaying) : "Nothing playing";

  return (
    <Box borderStyle="round" height={PLAYER_BAR_HEIGHT} paddingX={1} justifyContent="space-between">
      <Box flexShrink={1}>
        <Text>{`${STATUS_ICONS[playback.status]} `}</Text>
        <Text wrap="truncate-end">{title}</Text>
      </Box>
      <Box flexShrink={0}>
        <Text color="green">{formatGauge(ratio(playback.elapsedSec, playback.durationSec), PROGRESS_GAUGE_WIDTH)}</Text>
        <Text>{` ${formatProgress(playback.elapsedSec, playback.durationSec)}  `}</Text>
        <Text>Vol </Text>
        <Text color="yellow">{formatGauge(playback.volume, VOLUME_GAUGE_WIDTH)}</Text>
        <Text>{` ${playback.muted ? "muted" : formatVolume(playback.volume)}`}</Text>
        {playback.repeatTrack ? <Text color="magenta"> [repeat]</Text> : null}
      </Box>
    </Box>
  );
}

export const PlayerBar = memo(PlayerBarComponent);
