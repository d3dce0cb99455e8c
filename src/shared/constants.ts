import type { SearchField, SortCriteria } from "./types.js";

export const SUPPORTED_AUDIO_EXTENSIONS = new Set([
  ".aac",
  ".flac",
  ".m4a",
  ".mp3",
  ".ogg",
  ".opus",
  ".wav"
]);

export const APP_NAME = "termtune";

export const ALL_SONGS_PLAYLIST = "All Songs";

export const VOLUME_STEP = 0.05;

export const UNKNOWN_ARTIST = "Unknown Artist";

export const UNKNOWN_ALBUM = "Unknown Album";

export const DEFAULT_SETTINGS = {
  musicRoot: ".",
  scanRecursive: false,
  seekStepSec: 5,
  tickIntervalMs: 100,
  initialVolume: 1,
  logLevel: "info"
} as const;

export const SEARCH_FIELD_LABELS: Record<SearchField, string> = {
  title: "Title",
  artist: "Artist",
  album: "Album"
};

export const SORT_LABELS: Record<SortCriteria, string> = {
  title: "Title",
  artist: "Artist",
  duration: "Duration",
  shuffle: "Shuffle"
};
