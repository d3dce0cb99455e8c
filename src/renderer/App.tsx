import { useCallback, useEffect, useMemo, useState, type JSX } from "react";
import { Box, Text, useApp, useStdout } from "ink";
import { ALL_SONGS_PLAYLIST } from "../shared/constants.js";
import { computeLayout } from "../shared/layout.js";
import type { AppBridge, AppSnapshot, UiCommand } from "../shared/types.js";
import { DETAILS_PANEL_WIDTH, FALLBACK_ROWS, FALLBACK_SNAPSHOT } from "./app-defaults.js";
import { HelpPopup } from "./components/HelpPopup.js";
import { PlayerBar } from "./components/PlayerBar.js";
import { PlaylistNamePopup } from "./components/PlaylistNamePopup.js";
import { PlaylistPanel } from "./components/PlaylistPanel.js";
import { SearchBar } from "./components/SearchBar.js";
import { StatusLine } from "./components/StatusLine.js";
import { TrackDetails } from "./components/TrackDetails.js";
import { TrackList } from "./components/TrackList.js";
import { useKeyBindings } from "./hooks/use-key-bindings.js";

interface AppProps {
  api: AppBridge;
}

export function App({ api }: AppProps): JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [loaded, setLoaded] = useState(false);
  const [bootError, setBootError] = useState<string | null>(null);
  const [snapshot, setSnapshot] = useState<AppSnapshot>(FALLBACK_SNAPSHOT);
  const [rows, setRows] = useState<number>(stdout.rows || FALLBACK_ROWS);

  useEffect(() => {
    let disposed = false;

    const unsubscribe = api.subscribe((event) => {
      if (event.type === "app.snapshot") {
        setSnapshot(event.payload);
        return;
      }
      if (event.type === "app.exit") {
        exit();
      }
    });

    void api.init().then((initial) => {
      if (disposed) {
        return;
      }
      setSnapshot(initial);
      setLoaded(true);
    }, (error: unknown) => {
      if (!disposed) {
        setBootError(error instanceof Error ? error.message : String(error));
      }
    });

    return () => {
      disposed = true;
      unsubscribe();
    };
  }, [api, exit]);

  useEffect(() => {
    const onResize = (): void => {
      setRows(stdout.rows || FALLBACK_ROWS);
    };

    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  useEffect(() => {
    if (loaded) {
      void api.dispatch({ type: "resize", rows });
    }
  }, [api, loaded, rows]);

  const dispatch = useCallback((command: UiCommand) => {
    void api.dispatch(command);
  }, [api]);

  useKeyBindings({
    loaded,
    playlistInputVisible: snapshot.playlistInput.visible,
    dispatch,
    quit: exit
  });

  const layout = useMemo(() => computeLayout(rows), [rows]);
  const { view, playback } = snapshot;

  const selectedTrack = useMemo(
    () => view.tracks.find((track) => track.id === view.selectedTrackId) ?? null,
    [view.selectedTrackId, view.tracks]
  );
  const playlistName = view.playlists[view.activePlaylistIndex] ?? ALL_SONGS_PLAYLIST;

  if (bootError) {
    return <Text color="red">{`Unable to start: ${bootError}`}</Text>;
  }

  if (!loaded) {
    return <Text dimColor>Scanning music library...</Text>;
  }

  const popupOpen = snapshot.helpVisible || snapshot.playlistInput.visible;

  return (
    <Box flexDirection="column" height={layout.rows}>
      <SearchBar field={view.searchField} text={view.searchText} active={!popupOpen} />
      {snapshot.helpVisible ? (
        <HelpPopup height={layout.mainHeight} />
      ) : (
        <Box height={layout.mainHeight}>
          <Box flexDirection="column" width={DETAILS_PANEL_WIDTH} flexShrink={0}>
            <PlaylistPanel
              playlists={view.playlists}
              activeIndex={view.activePlaylistIndex}
              offset={view.playlistOffset}
              capacity={view.playlistCapacity}
              height={layout.playlistPanelHeight}
            />
            {snapshot.playlistInput.visible ? (
              <PlaylistNamePopup input={snapshot.playlistInput} chosenCount={snapshot.chosenTrackIds.length} />
            ) : (
              <TrackDetails track={selectedTrack} height={layout.detailsPanelHeight} />
            )}
          </Box>
          <TrackList
            playlistName={playlistName}
            tracks={view.tracks}
            selectedTrackId={view.selectedTrackId}
            currentTrackId={playback.currentTrackId}
            playbackStatus={playback.status}
            chosenTrackIds={snapshot.chosenTrackIds}
            sortCriteria={view.sortCriteria}
            offset={view.trackOffset}
            capacity={view.trackCapacity}
            height={layout.mainHeight}
          />
        </Box>
      )}
      <PlayerBar playback={playback} nowPlaying={snapshot.nowPlaying} />
      <StatusLine
        statusMessage={snapshot.statusMessage}
        backendError={snapshot.backendError}
        chosenCount={snapshot.chosenTrackIds.length}
      />
    </Box>
  );
}
