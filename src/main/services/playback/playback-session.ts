import { VOLUME_STEP } from "../../../shared/constants.js";
import { clamp } from "../../../shared/format.js";
import type {
  AdvanceDirection,
  PlaybackSessionState,
  PlaybackSnapshot,
  Track
} from "../../../shared/types.js";
import { createLogger } from "../logger.js";
import type { AudioSink } from "./backend.js";

const log = createLogger("session");

export class PlaybackError extends Error {
  public constructor(
    message: string,
    public readonly trackId: string | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PlaybackError";
  }
}

export type PlaybackResult = { ok: true } | { ok: false; error: PlaybackError };

export interface PlaybackCatalog {
  getById(trackId: string): Track | null;
  setPlaying(trackId: string | null): void;
}

/** The part of the view model playback reads from and writes back to. */
export interface PlaybackView {
  visibleTracks(): readonly Track[];
  selectTrack(trackId: string | null): void;
}

export interface PlaybackSessionOptions {
  tickIntervalMs: number;
  initialVolume: number;
}

export type StateChangeListener = (state: PlaybackSessionState) => void;

const OK: PlaybackResult = { ok: true };

function roundVolume(volume: number): number {
  return Math.round(clamp(volume, 0, 1) * 100) / 100;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns what is loaded, whether it is playing and how far it got. Elapsed time
 * is an offset plus the virtual clock since the last re-base; the clock only
 * moves through `tick`. Every public command runs exclusively, so a
 * clear/load/play sequence is never interleaved with another command.
 */
export class PlaybackSession {
  private state: PlaybackSessionState = { kind: "idle" };
  private clockMs = 0;
  private volume: number;
  private previousVolume: number | null = null;
  private muted = false;
  private repeatTrack = false;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly listeners = new Set<StateChangeListener>();
  private readonly tickIntervalMs: number;

  public constructor(
    private readonly sink: AudioSink,
    private readonly catalog: PlaybackCatalog,
    private readonly view: PlaybackView,
    options: PlaybackSessionOptions
  ) {
    this.tickIntervalMs = options.tickIntervalMs;
    this.volume = roundVolume(options.initialVolume);
  }

  public getState(): PlaybackSessionState {
    return { ...this.state };
  }

  public getCurrentTrackId(): string | null {
    return this.state.kind === "idle" ? null : this.state.trackId;
  }

  public getVolume(): number {
    return this.volume;
  }

  public getPreviousVolume(): number | null {
    return this.previousVolume;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public isRepeatEnabled(): boolean {
    return this.repeatTrack;
  }

  public onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Elapsed seconds of the loaded track, clamped into `[0, duration]`. */
  public elapsedSec(): number {
    const elapsed = this.rawElapsedSec();
    const duration = this.currentDuration();
    return duration === null ? Math.max(0, elapsed) : clamp(elapsed, 0, duration);
  }

  public snapshot(): PlaybackSnapshot {
    return {
      status: this.state.kind,
      currentTrackId: this.getCurrentTrackId(),
      elapsedSec: this.elapsedSec(),
      durationSec: this.currentDuration(),
      volume: this.volume,
      muted: this.muted,
      repeatTrack: this.repeatTrack
    };
  }

  /** Pushes the configured volume to a freshly started sink. */
  public async applyVolume(): Promise<PlaybackResult> {
    return await this.exclusive(() => this.writeVolume(this.volume));
  }

  public async start(trackId: string): Promise<PlaybackResult> {
    return await this.exclusive(() => this.startTrack(trackId));
  }

  /** Play-this / stop: stops when `trackId` is already loaded, otherwise starts it. */
  public async toggleSelect(trackId: string | null): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      if (trackId === null) {
        return OK;
      }
      if (this.getCurrentTrackId() === trackId) {
        await this.stopTrack();
        return OK;
      }
      return await this.startTrack(trackId);
    });
  }

  public async togglePlayPause(): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      const state = this.state;

      if (state.kind === "playing") {
        const elapsedSec = this.rawElapsedSec();
        try {
          await this.sink.pause();
        } catch (error) {
          return this.failure(`Unable to pause: ${errorMessage(error)}`, state.trackId, error);
        }
        this.catalog.setPlaying(null);
        this.transition({ kind: "paused", trackId: state.trackId, elapsedSec });
        return OK;
      }

      if (state.kind === "paused") {
        try {
          await this.sink.play();
        } catch (error) {
          return this.failure(`Unable to resume: ${errorMessage(error)}`, state.trackId, error);
        }
        this.catalog.setPlaying(state.trackId);
        this.transition({
          kind: "playing",
          trackId: state.trackId,
          startedAtMs: this.clockMs,
          offsetSec: state.elapsedSec
        });
      }

      return OK;
    });
  }

  /**
   * Moves the position by `deltaSec`, clamped to the track. A sink that cannot
   * seek leaves the audio where it is; the bookkeeping still moves.
   */
  public async seek(deltaSec: number): Promise<void> {
    await this.exclusive(async () => {
      const state = this.state;
      if (state.kind === "idle") {
        return;
      }

      const duration = this.currentDuration();
      const target = clamp(this.rawElapsedSec() + deltaSec, 0, duration ?? Number.POSITIVE_INFINITY);

      let seeked = false;
      try {
        seeked = await this.sink.trySeek(target);
      } catch (error) {
        log.debug("Seek failed", error);
      }
      if (!seeked) {
        log.debug(`Seek to ${target.toFixed(1)}s not supported`);
      }

      this.transition(
        state.kind === "playing"
          ? { kind: "playing", trackId: state.trackId, startedAtMs: this.clockMs, offsetSec: target }
          : { kind: "paused", trackId: state.trackId, elapsedSec: target }
      );
    });
  }

  /** Neighbor in the filtered view; a no-op at either end. */
  public async advance(direction: AdvanceDirection): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      const currentId = this.getCurrentTrackId();
      if (currentId === null) {
        return OK;
      }

      const tracks = this.view.visibleTracks();
      const index = tracks.findIndex((track) => track.id === currentId);
      if (index === -1) {
        return OK;
      }

      const neighbor = tracks[direction === "next" ? index + 1 : index - 1];
      if (!neighbor) {
        return OK;
      }

      return await this.startTrack(neighbor.id);
    });
  }

  /**
   * Folds one tick into the clock and handles end of track: repeat restarts,
   * otherwise the next visible track plays, wrapping past the end.
   */
  public async tick(stepMs = this.tickIntervalMs): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      this.clockMs += stepMs;

      const state = this.state;
      if (state.kind !== "playing") {
        return OK;
      }

      const duration = this.currentDuration();
      if (duration === null || this.rawElapsedSec() < duration) {
        return OK;
      }

      return await this.finishTrack(state.trackId);
    });
  }

  /**
   * The device ran out of audio. Only tracks of unknown length end this way;
   * the clock ends the rest.
   */
  public async endOfStream(): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      const state = this.state;
      if (state.kind !== "playing" || this.currentDuration() !== null) {
        return OK;
      }

      return await this.finishTrack(state.trackId);
    });
  }

  public async stop(): Promise<void> {
    await this.exclusive(() => this.stopTrack());
  }

  public async volumeUp(): Promise<PlaybackResult> {
    return await this.exclusive(() => this.changeVolume(this.volume + VOLUME_STEP));
  }

  public async volumeDown(): Promise<PlaybackResult> {
    return await this.exclusive(() => this.changeVolume(this.volume - VOLUME_STEP));
  }

  /** The volume before muting is only remembered while it is above zero. */
  public async mute(): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      if (this.volume > 0) {
        this.previousVolume = this.volume;
      }
      const result = await this.writeVolume(0);
      if (result.ok) {
        this.muted = true;
      }
      return result;
    });
  }

  public async unmute(): Promise<PlaybackResult> {
    return await this.exclusive(async () => {
      const result = await this.writeVolume(this.previousVolume ?? this.volume);
      if (result.ok) {
        this.muted = false;
      }
      return result;
    });
  }

  public async toggleMute(): Promise<PlaybackResult> {
    return this.muted ? await this.unmute() : await this.mute();
  }

  public toggleRepeat(): boolean {
    this.repeatTrack = !this.repeatTrack;
    return this.repeatTrack;
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.catch(() => undefined).then(task);
    this.queue = run;
    return await run;
  }

  private async startTrack(trackId: string): Promise<PlaybackResult> {
    const track = this.catalog.getById(trackId);
    if (!track || track.placeholder) {
      await this.stopTrack();
      return this.failure("Track not found", trackId);
    }

    try {
      await this.sink.clear();
      await this.sink.load(track.path);
      await this.sink.play();
    } catch (error) {
      this.catalog.setPlaying(null);
      this.transition({ kind: "idle" });
      return this.failure(`Unable to play "${track.title}": ${errorMessage(error)}`, trackId, error);
    }

    this.catalog.setPlaying(trackId);
    this.transition({ kind: "playing", trackId, startedAtMs: this.clockMs, offsetSec: 0 });
    this.view.selectTrack(trackId);
    return OK;
  }

  private async finishTrack(trackId: string): Promise<PlaybackResult> {
    if (this.repeatTrack) {
      return await this.startTrack(trackId);
    }

    const tracks = this.view.visibleTracks();
    const index = tracks.findIndex((track) => track.id === trackId);
    const next = index === -1 ? tracks[0] : tracks[(index + 1) % tracks.length];
    if (!next) {
      await this.stopTrack();
      return OK;
    }

    log.debug(`Auto-advancing to ${next.id}`);
    return await this.startTrack(next.id);
  }

  private async stopTrack(): Promise<void> {
    try {
      await this.sink.clear();
    } catch (error) {
      log.warn("Unable to clear the audio sink", error);
    }
    this.catalog.setPlaying(null);
    this.transition({ kind: "idle" });
  }

  private async changeVolume(volume: number): Promise<PlaybackResult> {
    const result = await this.writeVolume(volume);
    if (result.ok) {
      this.muted = false;
    }
    return result;
  }

  private async writeVolume(volume: number): Promise<PlaybackResult> {
    const next = roundVolume(volume);
    try {
      await this.sink.setVolume(next);
    } catch (error) {
      return this.failure(`Unable to set volume: ${errorMessage(error)}`, this.getCurrentTrackId(), error);
    }
    this.volume = next;
    return OK;
  }

  private rawElapsedSec(): number {
    switch (this.state.kind) {
      case "playing":
        return this.state.offsetSec + (this.clockMs - this.state.startedAtMs) / 1000;
      case "paused":
        return this.state.elapsedSec;
      default:
        return 0;
    }
  }

  private currentDuration(): number | null {
    const trackId = this.getCurrentTrackId();
    return trackId === null ? null : this.catalog.getById(trackId)?.durationSec ?? null;
  }

  private transition(next: PlaybackSessionState): void {
    const previous = this.state;
    this.state = next;
    if (previous.kind !== next.kind) {
      log.debug(`${previous.kind} -> ${next.kind}`);
    }
    for (const listener of this.listeners) {
      listener(this.getState());
    }
  }

  private failure(message: string, trackId: string | null, cause?: unknown): PlaybackResult {
    const error = new PlaybackError(message, trackId, cause === undefined ? undefined : { cause });
    log.warn(message);
    return { ok: false, error };
  }
}
