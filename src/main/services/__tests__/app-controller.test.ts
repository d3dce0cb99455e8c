import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AppEvent, AppSnapshot, Track } from "../../../shared/types.js";
import { AppController, type AppControllerOptions } from "../app-controller.js";
import { FakeSink } from "../playback/__tests__/fake-sink.js";
import type { RuntimeDependencyReport } from "../runtime-dependencies.js";
import { FakeTagReader } from "./fixtures.js";

const NOTHING_MISSING: RuntimeDependencyReport = { missingRequired: [], missingOptional: [] };

class BrokenSink extends FakeSink {
  public async start(): Promise<void> {
    this.calls.push("start");
    throw new Error("socket never appeared");
  }
}

function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  return new Promise((resolve, reject) => {
    const poll = (): void => {
      if (predicate()) {
        resolve();
        return;
      }
      if (Date.now() > deadline) {
        reject(new Error("Timed out waiting for condition"));
        return;
      }
      setTimeout(poll, 5);
    };
    poll();
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function titles(tracks: readonly Track[]): string[] {
  return tracks.map((track) => track.title);
}

describe("AppController", () => {
  let configDir: string;
  let musicDir: string;
  let events: AppEvent[];
  let sink: FakeSink;
  let controller: AppController | null;

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), "termtune-app-config-"));
    musicDir = await fs.mkdtemp(path.join(os.tmpdir(), "termtune-app-music-"));
    await Promise.all([
      fs.writeFile(path.join(musicDir, "a.mp3"), ""),
      fs.writeFile(path.join(musicDir, "b.mp3"), ""),
      // Slow ticks keep the background clock out of the way of these tests.
      fs.writeFile(path.join(configDir, "config.json"), JSON.stringify({ tickIntervalMs: 1000 }), "utf8")
    ]);
    events = [];
    sink = new FakeSink();
    controller = null;
  });

  afterEach(async () => {
    await controller?.shutdown();
    await fs.rm(configDir, { recursive: true, force: true });
    await fs.rm(musicDir, { recursive: true, force: true });
  });

  function createController(overrides: Partial<AppControllerOptions> = {}): AppController {
    controller = new AppController(
      {
        emit: (event) => {
          events.push(event);
        }
      },
      {
        configDir,
        env: { TERMTUNE_MUSIC_DIR: musicDir },
        initialRows: 24,
        tagReader: new FakeTagReader({
          "a.mp3": { title: "Alpha", artist: "Ann", album: "One", durationSec: 300, coverMimeType: null },
          "b.mp3": { title: "Beta", artist: "Bo", album: "Two", durationSec: 240, coverMimeType: null }
        }),
        createSink: () => sink,
        checkDependencies: async () => NOTHING_MISSING,
        ...overrides
      }
    );
    return controller;
  }

  function lastSnapshot(): AppSnapshot | null {
    for (let i = events.length - 1; i >= 0; i -= 1) {
      const event = events[i];
      if (event?.type === "app.snapshot") {
        return event.payload;
      }
    }
    return null;
  }

  it("scans the music directory and sizes the view on init", async () => {
    const app = createController();

    const snapshot = await app.init();

    expect(titles(snapshot.view.tracks)).toEqual(["Alpha", "Beta"]);
    expect(snapshot.view.selectedTrackId).toBe(snapshot.view.tracks[0]?.id);
    expect(snapshot.view.playlists).toEqual(["All Songs"]);
    expect(snapshot.view.trackCapacity).toBe(14);
    expect(snapshot.view.playlistCapacity).toBe(3);
    expect(snapshot.playback.status).toBe("idle");
    expect(snapshot.backendError).toBeNull();
    expect(sink.calls).toEqual(["start", "volume 1"]);
    expect(app.getSettings()?.musicRoot).toBe(musicDir);
    expect(lastSnapshot()).toEqual(snapshot);
  });

  it("plays the selected track and stops it on a second Enter", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "toggleSelect" });

    const playing = app.getSnapshot();
    expect(playing.playback.status).toBe("playing");
    expect(playing.nowPlaying?.title).toBe("Alpha");
    expect(lastSnapshot()?.playback.status).toBe("playing");
    expect(sink.calls.slice(2)).toEqual(["clear", `load ${path.join(musicDir, "a.mp3")}`, "play"]);

    await app.dispatch({ type: "toggleSelect" });

    expect(app.getSnapshot().playback.status).toBe("idle");
    expect(app.getSnapshot().nowPlaying).toBeNull();
  });

  it("seeks by the configured step", async () => {
    await fs.writeFile(
      path.join(configDir, "config.json"),
      JSON.stringify({ tickIntervalMs: 1000, seekStepSec: 15 }),
      "utf8"
    );
    const app = createController();
    await app.init();
    await app.dispatch({ type: "toggleSelect" });
    await app.dispatch({ type: "togglePause" });

    await app.dispatch({ type: "seek", direction: 1 });

    expect(sink.calls.at(-1)).toBe("seek 15");
    expect(app.getSnapshot().playback.elapsedSec).toBe(15);
  });

  it("announces repeat and sort changes in the status line", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "toggleRepeat" });
    expect(app.getSnapshot().statusMessage).toBe("Repeat track on");
    expect(app.getSnapshot().playback.repeatTrack).toBe(true);

    await app.dispatch({ type: "cycleSort" });
    expect(app.getSnapshot().statusMessage).toBe("Sorted by Artist");
  });

  it("routes typing to the search field", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "typeText", text: "bet" });

    expect(titles(app.getSnapshot().view.tracks)).toEqual(["Beta"]);

    await app.dispatch({ type: "backspace" });
    expect(app.getSnapshot().view.searchText).toBe("be");
  });

  it("refuses to create a playlist without a name or songs", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "openPlaylistInput" });
    await app.dispatch({ type: "submitPlaylistInput" });

    expect(app.getSnapshot().playlistInput).toEqual({
      visible: true,
      text: "",
      error: "Need a name and at least 1 song"
    });

    await app.dispatch({ type: "typeText", text: "Road" });
    await app.dispatch({ type: "toggleSelect" });

    expect(app.getSnapshot().playlistInput).toEqual({ visible: true, text: "", error: "Need at least 1 song" });
    expect(app.getSnapshot().view.playlists).toEqual(["All Songs"]);
  });

  it("creates a playlist from the chosen songs and persists it", async () => {
    const app = createController();
    const initial = await app.init();
    const [alpha] = initial.view.tracks;

    await app.dispatch({ type: "toggleChosen" });
    await app.dispatch({ type: "moveSelection", delta: 1 });
    await app.dispatch({ type: "toggleChosen" });
    await app.dispatch({ type: "toggleChosen" });
    expect(app.getSnapshot().chosenTrackIds).toEqual([alpha?.id]);

    await app.dispatch({ type: "openPlaylistInput" });
    await app.dispatch({ type: "typeText", text: "Ro" });
    await app.dispatch({ type: "typeText", text: "adx" });
    await app.dispatch({ type: "backspace" });
    expect(app.getSnapshot().playlistInput.text).toBe("Road");
    expect(app.getSnapshot().view.searchText).toBe("");

    await app.dispatch({ type: "submitPlaylistInput" });

    const snapshot = app.getSnapshot();
    expect(snapshot.view.playlists).toEqual(["All Songs", "Road"]);
    expect(snapshot.chosenTrackIds).toEqual([]);
    expect(snapshot.playlistInput).toEqual({ visible: false, text: "", error: null });
    expect(snapshot.statusMessage).toBe('Created playlist "Road"');

    const stored: unknown = JSON.parse(await fs.readFile(path.join(configDir, "playlists.json"), "utf8"));
    expect(stored).toEqual({ version: 1, playlists: { Road: [alpha?.id] } });
  });

  it("deletes user playlists but not All Songs", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "deletePlaylist" });
    expect(app.getSnapshot().statusMessage).toBe('"All Songs" cannot be deleted');

    await app.dispatch({ type: "toggleChosen" });
    await app.dispatch({ type: "openPlaylistInput" });
    await app.dispatch({ type: "typeText", text: "Road" });
    await app.dispatch({ type: "submitPlaylistInput" });
    await app.dispatch({ type: "movePlaylist", delta: 1 });
    expect(app.getSnapshot().view.activePlaylistIndex).toBe(1);

    await app.dispatch({ type: "deletePlaylist" });

    const snapshot = app.getSnapshot();
    expect(snapshot.statusMessage).toBe('Deleted playlist "Road"');
    expect(snapshot.view.playlists).toEqual(["All Songs"]);
    expect(snapshot.view.activePlaylistIndex).toBe(0);
  });

  it("exports the active playlist as an M3U file in the config directory", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "exportPlaylist" });

    const target = path.join(configDir, "exports", "All Songs.m3u");
    expect(app.getSnapshot().statusMessage).toBe(`Exported "All Songs" to ${target}`);
    expect(await fs.readFile(target, "utf8")).toBe(
      `#EXTM3U\n${path.join(musicDir, "a.mp3")}\n${path.join(musicDir, "b.mp3")}\n`
    );
  });

  it("imports M3U manifests found in the config directory and moves them aside", async () => {
    await fs.writeFile(path.join(configDir, "Mix.m3u"), `#EXTM3U\n${path.join(musicDir, "b.mp3")}\n`, "utf8");
    const app = createController();

    const snapshot = await app.init();

    expect(snapshot.view.playlists).toEqual(["All Songs", "Mix"]);
    expect(await fs.readdir(configDir)).not.toContain("Mix.m3u");
    expect(await fs.readdir(path.join(configDir, "imported"))).toEqual(["Mix.m3u"]);
  });

  it("does not bring back an imported playlist after it is deleted", async () => {
    await fs.writeFile(path.join(configDir, "Mix.m3u"), `#EXTM3U\n${path.join(musicDir, "b.mp3")}\n`, "utf8");
    const first = createController();
    await first.init();
    await first.dispatch({ type: "movePlaylist", delta: 1 });
    await first.dispatch({ type: "deletePlaylist" });
    expect(first.getSnapshot().view.playlists).toEqual(["All Songs"]);
    await first.shutdown();

    const second = createController();
    const snapshot = await second.init();

    expect(snapshot.view.playlists).toEqual(["All Songs"]);
  });

  it("runs the ticker only while playing", async () => {
    await fs.writeFile(path.join(configDir, "config.json"), JSON.stringify({ tickIntervalMs: 20 }), "utf8");
    const app = createController();
    await app.init();
    expect(app.isTickerRunning()).toBe(false);

    await app.dispatch({ type: "toggleSelect" });
    expect(app.isTickerRunning()).toBe(true);
    await waitFor(() => app.getSnapshot().playback.elapsedSec > 0);

    await app.dispatch({ type: "togglePause" });
    expect(app.isTickerRunning()).toBe(false);
    const pausedAt = app.getSnapshot().playback.elapsedSec;
    await sleep(100);
    expect(app.getSnapshot().playback.elapsedSec).toBe(pausedAt);

    await app.dispatch({ type: "togglePause" });
    expect(app.isTickerRunning()).toBe(true);
    await waitFor(() => app.getSnapshot().playback.elapsedSec > pausedAt);

    await app.dispatch({ type: "toggleSelect" });
    expect(app.getSnapshot().playback.status).toBe("idle");
    expect(app.isTickerRunning()).toBe(false);
  });

  it("moves past a track of unknown length when mpv reaches the end of the file", async () => {
    const app = createController({
      tagReader: new FakeTagReader({
        "a.mp3": { title: "Alpha", artist: "Ann", album: "One", durationSec: null, coverMimeType: null },
        "b.mp3": { title: "Beta", artist: "Bo", album: "Two", durationSec: 240, coverMimeType: null }
      })
    });
    await app.init();
    await app.dispatch({ type: "toggleSelect" });

    sink.emit({ type: "endOfFile", reason: "stop" });
    await app.dispatch({ type: "closePopups" });
    expect(app.getSnapshot().nowPlaying?.title).toBe("Alpha");

    sink.emit({ type: "endOfFile", reason: "eof" });
    await app.dispatch({ type: "closePopups" });

    expect(app.getSnapshot().nowPlaying?.title).toBe("Beta");
    expect(sink.calls.at(-2)).toBe(`load ${path.join(musicDir, "b.mp3")}`);
  });

  it("toggles help and closes popups on Esc", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "toggleHelp" });
    expect(app.getSnapshot().helpVisible).toBe(true);

    await app.dispatch({ type: "openPlaylistInput" });
    expect(app.getSnapshot().helpVisible).toBe(false);

    await app.dispatch({ type: "closePopups" });
    expect(app.getSnapshot().playlistInput.visible).toBe(false);
  });

  it("resizes the list viewports", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "resize", rows: 14 });

    expect(app.getSnapshot().view.trackCapacity).toBe(4);
    expect(app.getSnapshot().view.playlistCapacity).toBe(1);
  });

  it("emits an exit event on quit", async () => {
    const app = createController();
    await app.init();

    await app.dispatch({ type: "quit" });

    expect(events.at(-2)).toEqual({ type: "app.exit" });
  });

  it("keeps running without playback when mpv is missing", async () => {
    const app = createController({
      checkDependencies: async () => ({ missingRequired: ["mpv"], missingOptional: [] })
    });

    const snapshot = await app.init();
    expect(snapshot.backendError).toBe("mpv not found on PATH; playback is disabled");
    expect(sink.calls).toEqual([]);

    await app.dispatch({ type: "toggleSelect" });

    expect(app.getSnapshot().playback.status).toBe("idle");
    expect(app.getSnapshot().statusMessage).toBe(
      'Unable to play "Alpha": mpv not found on PATH; playback is disabled'
    );
  });

  it("reports an audio device that fails to start", async () => {
    const broken = new BrokenSink();
    const app = createController({ createSink: () => broken });

    const snapshot = await app.init();

    expect(snapshot.backendError).toBe("Unable to start mpv: socket never appeared");
    expect(broken.calls).toEqual(["start", "shutdown"]);
  });

  it("surfaces errors reported by the audio device", async () => {
    const app = createController();
    await app.init();

    sink.emit({ type: "error", message: "mpv exited with code 1" });

    expect(app.getSnapshot().backendError).toBe("mpv exited with code 1");
    expect(lastSnapshot()?.backendError).toBe("mpv exited with code 1");
  });

  it("persists playlists and shuts the device down on shutdown", async () => {
    const app = createController();
    await app.init();

    await app.shutdown();

    expect(sink.calls.at(-1)).toBe("shutdown");
    const stored: unknown = JSON.parse(await fs.readFile(path.join(configDir, "playlists.json"), "utf8"));
    expect(stored).toEqual({ version: 1, playlists: {} });
  });
});
