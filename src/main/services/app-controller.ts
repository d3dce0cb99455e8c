import path from "node:path";
import { promises as fs } from "node:fs";
import { ALL_SONGS_PLAYLIST, SORT_LABELS } from "../../shared/constants.js";
import { computeLayout } from "../../shared/layout.js";
import type {
  AppEvent,
  AppSettings,
  AppSnapshot,
  PlaybackSnapshot,
  PlaylistInputSnapshot,
  UiCommand
} from "../../shared/types.js";
import { ConfigStore } from "./config-store.js";
import { createLogger, setLogLevel } from "./logger.js";
import { MetadataService, type TagReader } from "./metadata-service.js";
import { isDirectory } from "./path-utils.js";
import type { AudioSink, AudioSinkEvent } from "./playback/backend.js";
import { MpvIpcBackend } from "./playback/mpv-ipc-backend.js";
import { PlaybackSession, type PlaybackResult } from "./playback/playback-session.js";
import { UnavailableSink } from "./playback/unavailable-sink.js";
import { PlaylistStore, PlaylistValidationError } from "./playlist-store.js";
import {
  checkRuntimeDependencies,
  describeMissingDependencies,
  type RuntimeDependencyReport
} from "./runtime-dependencies.js";
import { TickSource } from "./tick-source.js";
import { TrackCatalog } from "./track-catalog.js";
import { ViewModel, type RandomSource } from "./view-model.js";

const log = createLogger("controller");

const PLAYLISTS_FILE = "playlists.json";
const EXPORT_DIR = "exports";
const IMPORTED_DIR = "imported";
const STATUS_MESSAGE_MS = 3000;

interface EventTarget {
  emit(event: AppEvent): void;
}

export interface AppControllerOptions {
  configDir: string;
  env?: NodeJS.ProcessEnv;
  initialRows?: number;
  tagReader?: TagReader;
  random?: RandomSource;
  createSink?: () => AudioSink;
  checkDependencies?: () => Promise<RuntimeDependencyReport>;
}

interface Runtime {
  settings: AppSettings;
  sink: AudioSink;
  session: PlaybackSession;
  ticker: TickSource;
}

export class AppController {
  private readonly configStore: ConfigStore;
  private readonly catalog: TrackCatalog;
  private readonly playlists: PlaylistStore;
  private readonly view: ViewModel;
  private readonly eventTarget: EventTarget;

  private runtime: Runtime | null = null;
  private queue: Promise<void> = Promise.resolve();
  private playlistInput: PlaylistInputSnapshot = { visible: false, text: "", error: null };
  private helpVisible = false;
  private chosenTrackIds: string[] = [];
  private statusMessage: string | null = null;
  private backendError: string | null = null;
  private statusTimer: NodeJS.Timeout | null = null;
  private unsubscribeSink: (() => void) | null = null;
  private shutdownPromise: Promise<void> | null = null;

  public constructor(eventTarget: EventTarget, private readonly options: AppControllerOptions) {
    this.eventTarget = eventTarget;
    this.configStore = new ConfigStore(options.configDir, options.env ?? process.env);
    this.catalog = new TrackCatalog(options.tagReader ?? new MetadataService());
    this.playlists = new PlaylistStore(path.join(options.configDir, PLAYLISTS_FILE));
    this.view = new ViewModel(this.catalog, this.playlists, options.random ?? Math.random);
  }

  public async init(): Promise<AppSnapshot> {
    const settings = await this.configStore.load();
    setLogLevel(settings.logLevel);

    if (!(await isDirectory(settings.musicRoot))) {
      log.warn(`Music directory ${settings.musicRoot} does not exist; using ${process.cwd()}`);
      settings.musicRoot = process.cwd();
    }

    const sink = await this.startSink();
    this.unsubscribeSink = sink.subscribe((event) => {
      this.handleSinkEvent(event);
    });

    await this.playlists.restore();
    await this.catalog.scan(settings.musicRoot, { recursive: settings.scanRecursive });
    this.playlists.setAllSongs(this.catalog.allIds());
    await this.importLegacyPlaylists();

    const layout = computeLayout(this.options.initialRows ?? 24);
    this.view.setViewport(layout.trackCapacity, layout.playlistCapacity);
    this.view.invalidate();

    const session = new PlaybackSession(sink, this.catalog, this.view, {
      tickIntervalMs: settings.tickIntervalMs,
      initialVolume: settings.initialVolume
    });
    const ticker = new TickSource(settings.tickIntervalMs);
    this.runtime = { settings, sink, session, ticker };

    session.onStateChange((state) => {
      if (state.kind === "playing") {
        ticker.start();
      }
    });
    ticker.onTick(() => {
      void this.enqueue(() => this.handleTick());
    });

    const volume = await session.applyVolume();
    if (!volume.ok) {
      log.warn("Unable to apply the initial volume", volume.error);
    }

    const snapshot = this.getSnapshot();
    this.emitSnapshot();
    return snapshot;
  }

  /** Runs one command after every previously dispatched one has finished. */
  public dispatch(command: UiCommand): Promise<void> {
    return this.enqueue(() => this.handleCommand(command));
  }

  public isTickerRunning(): boolean {
    return this.runtime?.ticker.isRunning() ?? false;
  }

  public getSettings(): AppSettings | null {
    return this.runtime ? { ...this.runtime.settings } : null;
  }

  public getSnapshot(): AppSnapshot {
    const playback: PlaybackSnapshot = this.runtime?.session.snapshot() ?? {
      status: "idle",
      currentTrackId: null,
      elapsedSec: 0,
      durationSec: null,
      volume: 1,
      muted: false,
      repeatTrack: false
    };

    return {
      playback,
      nowPlaying: playback.currentTrackId ? this.catalog.getById(playback.currentTrackId) : null,
      view: this.view.snapshot(),
      playlistInput: { ...this.playlistInput },
      helpVisible: this.helpVisible,
      chosenTrackIds: [...this.chosenTrackIds],
      statusMessage: this.statusMessage,
      backendError: this.backendError
    };
  }

  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      await this.queue;

      if (this.statusTimer) {
        clearTimeout(this.statusTimer);
        this.statusTimer = null;
      }

      this.unsubscribeSink?.();
      this.unsubscribeSink = null;

      const runtime = this.runtime;
      if (runtime) {
        await runtime.ticker.stop();
      }

      try {
        await this.playlists.persist();
      } catch (error) {
        log.warn("Unable to persist playlists on exit", error);
      }

      if (runtime) {
        try {
          await runtime.sink.shutdown();
        } catch (error) {
          log.warn("Audio sink did not shut down cleanly", error);
        }
      }
    })();

    await this.shutdownPromise;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(async () => {
      try {
        await task();
      } catch (error) {
        log.error("Command failed", error);
        this.setTemporaryStatus(error instanceof Error ? error.message : String(error));
      }
      await this.syncTicker();
      this.emitSnapshot();
    });
    this.queue = run;
    return run;
  }

  private async handleTick(): Promise<void> {
    const runtime = this.runtime;
    if (!runtime || !runtime.ticker.drain()) {
      return;
    }

    this.report(await runtime.session.tick());
  }

  private async handleEndOfStream(): Promise<void> {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    this.report(await runtime.session.endOfStream());
  }

  private async handleCommand(command: UiCommand): Promise<void> {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    const { session, settings } = runtime;

    switch (command.type) {
      case "moveSelection":
        this.view.moveSelection(command.delta);
        return;
      case "movePlaylist":
        this.view.movePlaylist(command.delta);
        return;
      case "toggleSelect":
        if (this.playlistInput.visible) {
          await this.submitPlaylistInput();
          return;
        }
        this.report(await session.toggleSelect(this.view.getSelectedTrackId()));
        return;
      case "togglePause":
        this.report(await session.togglePlayPause());
        return;
      case "seek":
        await session.seek(command.direction * settings.seekStepSec);
        return;
      case "advance":
        this.report(await session.advance(command.direction));
        return;
      case "volumeUp":
        this.report(await session.volumeUp());
        return;
      case "volumeDown":
        this.report(await session.volumeDown());
        return;
      case "toggleMute":
        this.report(await session.toggleMute());
        return;
      case "toggleRepeat":
        this.setTemporaryStatus(session.toggleRepeat() ? "Repeat track on" : "Repeat track off");
        return;
      case "cycleSearchField":
        this.view.cycleSearchField();
        return;
      case "cycleSort":
        this.setTemporaryStatus(`Sorted by ${SORT_LABELS[this.view.cycleSort()]}`);
        return;
      case "toggleChosen":
        this.toggleChosen();
        return;
      case "openPlaylistInput":
        this.helpVisible = false;
        this.playlistInput = { visible: true, text: "", error: null };
        return;
      case "submitPlaylistInput":
        await this.submitPlaylistInput();
        return;
      case "deletePlaylist":
        await this.deleteActivePlaylist();
        return;
      case "exportPlaylist":
        await this.exportActivePlaylist();
        return;
      case "toggleHelp":
        this.helpVisible = !this.helpVisible;
        return;
      case "closePopups":
        this.helpVisible = false;
        this.playlistInput = { visible: false, text: "", error: null };
        return;
      case "typeText":
        if (this.playlistInput.visible) {
          this.playlistInput = { visible: true, text: this.playlistInput.text + command.text, error: null };
        } else {
          this.view.appendSearchText(command.text);
        }
        return;
      case "backspace":
        if (this.playlistInput.visible) {
          this.playlistInput = {
            visible: true,
            text: [...this.playlistInput.text].slice(0, -1).join(""),
            error: null
          };
        } else {
          this.view.deleteSearchCharacter();
        }
        return;
      case "resize": {
        const layout = computeLayout(command.rows);
        this.view.setViewport(layout.trackCapacity, layout.playlistCapacity);
        return;
      }
      case "quit":
        this.eventTarget.emit({ type: "app.exit" });
        return;
      default:
        return;
    }
  }

  private toggleChosen(): void {
    const trackId = this.view.getSelectedTrackId();
    const track = trackId ? this.catalog.getById(trackId) : null;
    if (!trackId || !track || track.placeholder) {
      return;
    }

    this.chosenTrackIds = this.chosenTrackIds.includes(trackId)
      ? this.chosenTrackIds.filter((id) => id !== trackId)
      : [...this.chosenTrackIds, trackId];
  }

  private async submitPlaylistInput(): Promise<void> {
    const name = this.playlistInput.text.trim();

    let created: string;
    try {
      created = this.playlists.create(name, this.chosenTrackIds).name;
    } catch (error) {
      if (error instanceof PlaylistValidationError) {
        this.playlistInput = { visible: true, text: "", error: error.message };
        return;
      }
      throw error;
    }

    await this.persistPlaylists();
    this.chosenTrackIds = [];
    this.playlistInput = { visible: false, text: "", error: null };
    this.view.invalidate();
    this.setTemporaryStatus(`Created playlist "${created}"`);
  }

  private async deleteActivePlaylist(): Promise<void> {
    const name = this.view.getActivePlaylistName();
    if (name === ALL_SONGS_PLAYLIST) {
      this.setTemporaryStatus(`"${ALL_SONGS_PLAYLIST}" cannot be deleted`);
      return;
    }

    try {
      await this.playlists.delete(name);
    } catch (error) {
      log.warn(`Unable to persist after deleting "${name}"`, error);
    }
    this.view.selectPlaylist(0);
    this.view.invalidate();
    this.setTemporaryStatus(`Deleted playlist "${name}"`);
  }

  private async exportActivePlaylist(): Promise<void> {
    const name = this.view.getActivePlaylistName();
    const target = await this.playlists.exportM3u(
      name,
      path.join(this.options.configDir, EXPORT_DIR),
      (trackId) => this.catalog.getById(trackId)?.path || null
    );
    this.setTemporaryStatus(`Exported "${name}" to ${target}`);
  }

  private async persistPlaylists(): Promise<void> {
    try {
      await this.playlists.persist();
    } catch (error) {
      log.warn("Unable to persist playlists", error);
    }
  }

  /**
   * `.m3u` manifests in the config directory become playlists unless the name
   * is taken. Once saved, imported manifests move to `imported/`.
   */
  private async importLegacyPlaylists(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.options.configDir);
    } catch {
      // No config directory yet: nothing to import.
      return;
    }

    const imported: string[] = [];
    for (const entry of entries.sort()) {
      if (path.extname(entry).toLowerCase() !== ".m3u") {
        continue;
      }

      const name = path.basename(entry, path.extname(entry));
      if (this.playlists.has(name)) {
        continue;
      }

      try {
        await this.playlists.importM3u(path.join(this.options.configDir, entry));
        imported.push(entry);
      } catch (error) {
        log.warn(`Skipping playlist manifest ${entry}`, error);
      }
    }

    if (imported.length === 0) {
      return;
    }

    log.info(`Imported ${imported.length} playlist manifest(s)`);
    try {
      await this.playlists.persist();
    } catch (error) {
      log.warn("Unable to persist imported playlists; manifests stay in place", error);
      return;
    }

    const importedDir = path.join(this.options.configDir, IMPORTED_DIR);
    await fs.mkdir(importedDir, { recursive: true });
    for (const entry of imported) {
      try {
        await fs.rename(path.join(this.options.configDir, entry), path.join(importedDir, entry));
      } catch (error) {
        log.warn(`Unable to move imported manifest ${entry}`, error);
      }
    }
  }

  private async startSink(): Promise<AudioSink> {
    const report = await (this.options.checkDependencies ?? checkRuntimeDependencies)();
    const missing = describeMissingDependencies(report);
    if (missing) {
      this.backendError = missing;
      log.warn(missing);
      return new UnavailableSink(missing);
    }

    const sink = this.options.createSink?.() ?? new MpvIpcBackend();
    try {
      await sink.start();
      return sink;
    } catch (error) {
      const message = `Unable to start mpv: ${error instanceof Error ? error.message : String(error)}`;
      this.backendError = message;
      log.error(message);
      await sink.shutdown().catch((shutdownError: unknown) => {
        log.debug("Ignoring shutdown failure of a sink that never started", shutdownError);
      });
      return new UnavailableSink(message);
    }
  }

  private handleSinkEvent(event: AudioSinkEvent): void {
    switch (event.type) {
      case "error":
        log.error(event.message);
        this.backendError = event.message;
        this.emitSnapshot();
        return;
      case "endOfFile":
        log.debug(`Sink reached end of file (${event.reason})`);
        if (event.reason === "eof") {
          void this.enqueue(() => this.handleEndOfStream());
        }
        return;
      default:
        return;
    }
  }

  private async syncTicker(): Promise<void> {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    if (runtime.session.getState().kind === "playing") {
      runtime.ticker.start();
    } else {
      await runtime.ticker.stop();
    }
  }

  private report(result: PlaybackResult): void {
    if (!result.ok) {
      this.setTemporaryStatus(result.error.message);
    }
  }

  private setTemporaryStatus(message: string): void {
    this.statusMessage = message;

    if (this.statusTimer) {
      clearTimeout(this.statusTimer);
    }

    this.statusTimer = setTimeout(() => {
      this.statusTimer = null;
      this.statusMessage = null;
      this.emitSnapshot();
    }, STATUS_MESSAGE_MS);
    this.statusTimer.unref();
  }

  private emitSnapshot(): void {
    this.eventTarget.emit({ type: "app.snapshot", payload: this.getSnapshot() });
  }
}
