export type SearchField = "title" | "artist" | "album";

export type SortCriteria = "title" | "artist" | "duration" | "shuffle";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface AppSettings {
  musicRoot: string;
  scanRecursive: boolean;
  seekStepSec: number;
  tickIntervalMs: number;
  initialVolume: number;
  logLevel: LogLevel;
}

export interface CoverArt {
  source: "embedded" | "folder";
  mimeType: string;
  location: string;
}

export interface Track {
  id: string;
  title: string;
  artist: string;
  album: string;
  /** Seconds; `null` when the tag reader could not determine it. */
  durationSec: number | null;
  path: string;
  cover: CoverArt | null;
  isPlaying: boolean;
  placeholder: boolean;
}

export type PlaybackSessionState =
  | { kind: "idle" }
  | { kind: "playing"; trackId: string; startedAtMs: number; offsetSec: number }
  | { kind: "paused"; trackId: string; elapsedSec: number };

export type PlaybackStatus = PlaybackSessionState["kind"];

export type AdvanceDirection = "next" | "previous";

export interface PlaybackSnapshot {
  status: PlaybackStatus;
  currentTrackId: string | null;
  elapsedSec: number;
  durationSec: number | null;
  volume: number;
  muted: boolean;
  repeatTrack: boolean;
}

export interface PlaylistEntry {
  name: string;
  trackIds: string[];
}

export interface ViewSnapshot {
  searchText: string;
  searchField: SearchField;
  sortCriteria: SortCriteria;
  playlists: string[];
  activePlaylistIndex: number;
  playlistOffset: number;
  tracks: Track[];
  selectedTrackId: string | null;
  trackOffset: number;
  trackCapacity: number;
  playlistCapacity: number;
}

export interface PlaylistInputSnapshot {
  visible: boolean;
  text: string;
  error: string | null;
}

export interface AppSnapshot {
  playback: PlaybackSnapshot;
  nowPlaying: Track | null;
  view: ViewSnapshot;
  playlistInput: PlaylistInputSnapshot;
  helpVisible: boolean;
  chosenTrackIds: string[];
  statusMessage: string | null;
  backendError: string | null;
}

export type AppEvent =
  | { type: "app.snapshot"; payload: AppSnapshot }
  | { type: "app.exit" };

export type UiCommand =
  | { type: "moveSelection"; delta: 1 | -1 }
  | { type: "movePlaylist"; delta: 1 | -1 }
  | { type: "toggleSelect" }
  | { type: "togglePause" }
  | { type: "seek"; direction: 1 | -1 }
  | { type: "advance"; direction: AdvanceDirection }
  | { type: "volumeUp" }
  | { type: "volumeDown" }
  | { type: "toggleMute" }
  | { type: "toggleRepeat" }
  | { type: "cycleSearchField" }
  | { type: "cycleSort" }
  | { type: "toggleChosen" }
  | { type: "openPlaylistInput" }
  | { type: "submitPlaylistInput" }
  | { type: "deletePlaylist" }
  | { type: "exportPlaylist" }
  | { type: "toggleHelp" }
  | { type: "closePopups" }
  | { type: "typeText"; text: string }
  | { type: "backspace" }
  | { type: "resize"; rows: number }
  | { type: "quit" };

/** What the renderer may call; the only way it reaches the controller. */
export interface AppBridge {
  init(): Promise<AppSnapshot>;
  dispatch(command: UiCommand): Promise<void>;
  subscribe(listener: (event: AppEvent) => void): () => void;
}
