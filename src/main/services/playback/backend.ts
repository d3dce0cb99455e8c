export type AudioSinkEvent =
  | { type: "endOfFile"; reason: string }
  | { type: "error"; message: string };

/**
 * The audio output device. Every call is one command to the device; callers
 * that need several commands to run as a unit serialize them themselves.
 */
export interface AudioSink {
  start(): Promise<void>;
  shutdown(): Promise<void>;
  load(filePath: string): Promise<void>;
  clear(): Promise<void>;
  play(): Promise<void>;
  pause(): Promise<void>;
  isPaused(): boolean;
  /** Best-effort position in seconds as last reported by the device. */
  getPosition(): number;
  /** Resolves `false` when the loaded stream cannot seek. */
  trySeek(positionSec: number): Promise<boolean>;
  getVolume(): number;
  /** `volume` in `[0, 1]`. */
  setVolume(volume: number): Promise<void>;
  subscribe(listener: (event: AudioSinkEvent) => void): () => void;
}
