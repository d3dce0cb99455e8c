import { describe, expect, it } from "vitest";
import type { PlaybackSessionState, Track } from "../../../../shared/types.js";
import { createLibrary, makeTrack } from "../../__tests__/fixtures.js";
import { createPlaceholderTrack } from "../../track-catalog.js";
import { PlaybackError, PlaybackSession } from "../playback-session.js";
import { FakeSink } from "./fake-sink.js";

function setup(tracks: Track[], initialVolume = 1) {
  const library = createLibrary(tracks);
  const sink = new FakeSink();
  const session = new PlaybackSession(sink, library.catalog, library.view, {
    tickIntervalMs: 100,
    initialVolume
  });
  return { ...library, sink, session };
}

async function tickSeconds(session: PlaybackSession, seconds: number): Promise<void> {
  for (let i = 0; i < seconds; i += 1) {
    await session.tick(1000);
  }
}

describe("PlaybackSession", () => {
  const trackA = (): Track => makeTrack("Track A", 10);
  const trackB = (): Track => makeTrack("Track B", 20);

  it("starts by clearing, loading and playing the track as one unit", async () => {
    const a = trackA();
    const { session, sink, catalog, view } = setup([a, trackB()]);

    const result = await session.start(a.id);

    expect(result).toEqual({ ok: true });
    expect(sink.calls).toEqual(["clear", "load /music/Track A.mp3", "play"]);
    expect(session.getState()).toEqual({ kind: "playing", trackId: a.id, startedAtMs: 0, offsetSec: 0 });
    expect(catalog.getPlayingTrackId()).toBe(a.id);
    expect(view.getSelectedTrackId()).toBe(a.id);
  });

  it("auto-advances to the next track after ten one-second ticks", async () => {
    const a = trackA();
    const b = trackB();
    const { session, view } = setup([a, b]);
    await session.start(a.id);

    await tickSeconds(session, 9);
    expect(session.getCurrentTrackId()).toBe(a.id);
    expect(session.elapsedSec()).toBe(9);

    await session.tick(1000);

    expect(session.getState()).toEqual({ kind: "playing", trackId: b.id, startedAtMs: 10_000, offsetSec: 0 });
    expect(session.elapsedSec()).toBe(0);
    expect(a.isPlaying).toBe(false);
    expect(b.isPlaying).toBe(true);
    expect(view.getSelectedTrackId()).toBe(b.id);
  });

  it("wraps auto-advance from the last visible track to the first", async () => {
    const a = trackA();
    const b = trackB();
    const { session } = setup([a, b]);
    await session.start(b.id);

    await tickSeconds(session, 20);

    expect(session.getCurrentTrackId()).toBe(a.id);
    expect(session.elapsedSec()).toBe(0);
  });

  it("restarts the same track when repeat is on", async () => {
    const a = trackA();
    const { session, sink } = setup([a, trackB()]);
    expect(session.toggleRepeat()).toBe(true);
    await session.start(a.id);

    await tickSeconds(session, 10);

    expect(session.getState()).toEqual({ kind: "playing", trackId: a.id, startedAtMs: 10_000, offsetSec: 0 });
    expect(sink.calls.filter((call) => call.startsWith("load"))).toEqual([
      "load /music/Track A.mp3",
      "load /music/Track A.mp3"
    ]);
  });

  it("goes idle at the end of a track when the filtered view is empty", async () => {
    const a = trackA();
    const { session, view, catalog } = setup([a, trackB()]);
    await session.start(a.id);
    view.setSearchText("no such song");

    await tickSeconds(session, 10);

    expect(session.getState()).toEqual({ kind: "idle" });
    expect(catalog.getPlayingTrackId()).toBeNull();
  });

  it("continues with the first visible track when the finished one was filtered out", async () => {
    const a = trackA();
    const b = trackB();
    const c = makeTrack("Track C", 5);
    const { session, view } = setup([a, b, c]);
    await session.start(a.id);
    view.setSearchText("track c");

    await tickSeconds(session, 10);

    expect(session.getCurrentTrackId()).toBe(c.id);
  });

  it("never auto-advances a track of unknown duration on the clock", async () => {
    const unknown = makeTrack("Mystery", null);
    const { session } = setup([unknown, trackA()]);
    await session.start(unknown.id);

    await tickSeconds(session, 600);

    expect(session.getCurrentTrackId()).toBe(unknown.id);
    expect(session.elapsedSec()).toBe(600);
  });

  it("advances a track of unknown duration when the device runs out of audio", async () => {
    const unknown = makeTrack("Mystery", null);
    const a = trackA();
    const { session } = setup([unknown, a]);
    await session.start(unknown.id);
    await tickSeconds(session, 42);

    expect(await session.endOfStream()).toEqual({ ok: true });

    expect(session.getState()).toEqual({ kind: "playing", trackId: a.id, startedAtMs: 42_000, offsetSec: 0 });
  });

  it("leaves tracks of known duration to the clock at end of stream", async () => {
    const a = trackA();
    const { session, sink } = setup([a, trackB()]);
    await session.start(a.id);
    await tickSeconds(session, 4);

    await session.endOfStream();

    expect(session.getCurrentTrackId()).toBe(a.id);
    expect(session.elapsedSec()).toBe(4);
    expect(sink.calls).toEqual(["clear", "load /music/Track A.mp3", "play"]);
  });

  it("freezes elapsed time while paused and resumes where it stopped", async () => {
    const a = trackA();
    const { session, sink, catalog } = setup([a, trackB()]);
    await session.start(a.id);
    await tickSeconds(session, 3);

    await session.togglePlayPause();
    expect(session.getState()).toEqual({ kind: "paused", trackId: a.id, elapsedSec: 3 });
    expect(catalog.getPlayingTrackId()).toBeNull();
    expect(sink.isPaused()).toBe(true);

    await tickSeconds(session, 5);
    expect(session.elapsedSec()).toBe(3);

    await session.togglePlayPause();
    expect(session.getState()).toEqual({ kind: "playing", trackId: a.id, startedAtMs: 8000, offsetSec: 3 });
    expect(catalog.getPlayingTrackId()).toBe(a.id);

    await session.tick(1000);
    expect(session.elapsedSec()).toBe(4);
  });

  it("keeps elapsed time non-decreasing across pause and resume pairs", async () => {
    const long = makeTrack("Long", 1000);
    const { session } = setup([long]);
    await session.start(long.id);

    let previous = session.elapsedSec();
    for (let round = 0; round < 5; round += 1) {
      await tickSeconds(session, 2);
      await session.togglePlayPause();
      await tickSeconds(session, 1);
      await session.togglePlayPause();
      const elapsed = session.elapsedSec();
      expect(elapsed).toBeGreaterThanOrEqual(previous);
      previous = elapsed;
    }

    expect(previous).toBe(10);
  });

  it("does nothing on pause/resume while idle", async () => {
    const { session, sink } = setup([trackA()]);

    expect(await session.togglePlayPause()).toEqual({ ok: true });
    expect(session.getState()).toEqual({ kind: "idle" });
    expect(sink.calls).toEqual([]);
  });

  it("clamps seeks into the track and advances on the next tick after seeking past the end", async () => {
    const a = trackA();
    const b = trackB();
    const { session, sink } = setup([a, b]);
    await session.start(a.id);
    await tickSeconds(session, 2);

    await session.seek(-5);
    expect(session.elapsedSec()).toBe(0);

    await session.seek(50);
    expect(session.elapsedSec()).toBe(10);
    expect(sink.calls.slice(-2)).toEqual(["seek 0", "seek 10"]);

    await session.tick(100);
    expect(session.getCurrentTrackId()).toBe(b.id);
  });

  it("re-bases a paused session on seek without resuming it", async () => {
    const a = trackA();
    const { session } = setup([a]);
    await session.start(a.id);
    await session.togglePlayPause();

    await session.seek(4);

    expect(session.getState()).toEqual({ kind: "paused", trackId: a.id, elapsedSec: 4 });
  });

  it("still moves the position when the sink cannot seek", async () => {
    const a = trackA();
    const { session, sink } = setup([a]);
    sink.seekable = false;
    await session.start(a.id);

    await session.seek(5);

    expect(session.elapsedSec()).toBe(5);
  });

  it("ignores seeks while idle", async () => {
    const { session, sink } = setup([trackA()]);

    await session.seek(5);

    expect(sink.calls).toEqual([]);
    expect(session.getState()).toEqual({ kind: "idle" });
  });

  it("moves to neighbors on manual advance without wrapping", async () => {
    const a = trackA();
    const b = trackB();
    const { session, sink, view } = setup([a, b]);
    await session.start(b.id);
    const callsAfterStart = sink.calls.length;

    expect(await session.advance("next")).toEqual({ ok: true });
    expect(session.getCurrentTrackId()).toBe(b.id);
    expect(sink.calls).toHaveLength(callsAfterStart);

    await session.advance("previous");
    expect(session.getCurrentTrackId()).toBe(a.id);
    expect(view.getSelectedTrackId()).toBe(a.id);

    await session.advance("previous");
    expect(session.getCurrentTrackId()).toBe(a.id);
  });

  it("stops when the selected track is the loaded one and starts it otherwise", async () => {
    const a = trackA();
    const b = trackB();
    const { session, sink, catalog } = setup([a, b]);

    await session.toggleSelect(a.id);
    expect(session.getCurrentTrackId()).toBe(a.id);

    await session.toggleSelect(b.id);
    expect(session.getCurrentTrackId()).toBe(b.id);

    await session.toggleSelect(b.id);
    expect(session.getState()).toEqual({ kind: "idle" });
    expect(catalog.getPlayingTrackId()).toBeNull();
    expect(sink.calls.at(-1)).toBe("clear");
  });

  it("reports a failed start and stays idle with no track flagged as playing", async () => {
    const a = trackA();
    const b = trackB();
    const { session, sink, catalog } = setup([a, b]);
    await session.start(b.id);
    sink.failingPaths.add(a.path);

    const result = await session.start(a.id);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PlaybackError);
      expect(result.error.trackId).toBe(a.id);
      expect(result.error.message).toBe('Unable to play "Track A": cannot decode /music/Track A.mp3');
    }
    expect(session.getState()).toEqual({ kind: "idle" });
    expect(catalog.getPlayingTrackId()).toBeNull();
    expect(b.isPlaying).toBe(false);
  });

  it("treats the placeholder and unknown ids as missing tracks", async () => {
    const placeholder = createPlaceholderTrack("/music");
    const { session } = setup([placeholder]);

    const missing = await session.start(placeholder.id);
    const unknown = await session.start("not-a-track");

    expect(missing.ok).toBe(false);
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(unknown.error.message).toBe("Track not found");
    }
    expect(session.getState()).toEqual({ kind: "idle" });
  });

  it("never interleaves two concurrent starts", async () => {
    const a = trackA();
    const b = trackB();
    const { session, sink } = setup([a, b]);

    await Promise.all([session.start(a.id), session.start(b.id)]);

    expect(sink.calls).toEqual([
      "clear",
      "load /music/Track A.mp3",
      "play",
      "clear",
      "load /music/Track B.mp3",
      "play"
    ]);
    expect(session.getCurrentTrackId()).toBe(b.id);
    expect(a.isPlaying).toBe(false);
  });

  it("stops from any state", async () => {
    const a = trackA();
    const { session, catalog } = setup([a]);
    await session.start(a.id);
    await session.togglePlayPause();

    await session.stop();

    expect(session.getState()).toEqual({ kind: "idle" });
    expect(session.elapsedSec()).toBe(0);
    expect(catalog.getPlayingTrackId()).toBeNull();
  });

  it("steps volume by 0.05 within [0, 1] without float drift", async () => {
    const { session, sink } = setup([trackA()]);

    await session.volumeUp();
    expect(session.getVolume()).toBe(1);

    await session.volumeDown();
    await session.volumeDown();
    await session.volumeDown();
    expect(session.getVolume()).toBe(0.85);
    expect(sink.getVolume()).toBe(0.85);
  });

  it("remembers the volume before muting and ignores a second mute", async () => {
    const { session } = setup([trackA()], 0.6);

    await session.mute();
    expect(session.getVolume()).toBe(0);
    expect(session.getPreviousVolume()).toBe(0.6);

    await session.mute();
    expect(session.getPreviousVolume()).toBe(0.6);

    await session.unmute();
    expect(session.getVolume()).toBe(0.6);
    expect(session.isMuted()).toBe(false);
  });

  it("toggles mute back and forth", async () => {
    const { session } = setup([trackA()], 0.4);

    await session.toggleMute();
    expect(session.snapshot().muted).toBe(true);
    expect(session.snapshot().volume).toBe(0);

    await session.toggleMute();
    expect(session.snapshot().muted).toBe(false);
    expect(session.snapshot().volume).toBe(0.4);
  });

  it("notifies state listeners on every transition", async () => {
    const a = trackA();
    const { session } = setup([a]);
    const kinds: Array<PlaybackSessionState["kind"]> = [];
    const unsubscribe = session.onStateChange((state) => {
      kinds.push(state.kind);
    });

    await session.start(a.id);
    await session.togglePlayPause();
    await session.stop();
    unsubscribe();
    await session.start(a.id);

    expect(kinds).toEqual(["playing", "paused", "idle"]);
  });

  it("clamps elapsed time for display and reports the loaded track in snapshots", async () => {
    const a = trackA();
    const { session } = setup([a]);
    await session.start(a.id);
    await session.tick(2500);

    expect(session.snapshot()).toEqual({
      status: "playing",
      currentTrackId: a.id,
      elapsedSec: 2.5,
      durationSec: 10,
      volume: 1,
      muted: false,
      repeatTrack: false
    });
  });
});
