import type { AppSnapshot, PlaybackSnapshot, ViewSnapshot } from "../shared/types.js";

export const FALLBACK_ROWS = 24;
export const DETAILS_PANEL_WIDTH = 36;
export const PROGRESS_GAUGE_WIDTH = 24;
export const VOLUME_GAUGE_WIDTH = 10;

export const FALLBACK_PLAYBACK: PlaybackSnapshot = {
  status: "idle",
  currentTrackId: null,
  elapsedSec: 0,
  durationSec: null,
  volume: 1,
  muted: false,
  repeatTrack: false
};

export const FALLBACK_VIEW: ViewSnapshot = {
  searchText: "",
  searchField: "title",
  sortCriteria: "title",
  playlists: [],
  activePlaylistIndex: 0,
  playlistOffset: 0,
  tracks: [],
  selectedTrackId: null,
  trackOffset: 0,
  trackCapacity: 1,
  playlistCapacity: 1
};

export const FALLBACK_SNAPSHOT: AppSnapshot = {
  playback: FALLBACK_PLAYBACK,
  nowPlaying: null,
  view: FALLBACK_VIEW,
  playlistInput: {
    visible: false,
    text: "",
    error: null
  },
  helpVisible: false,
  chosenTrackIds: [],
  statusMessage: null,
  backendError: null
};
