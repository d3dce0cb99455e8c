import type { AudioSink } from "./backend.js";

/** Stands in for the audio device when it cannot be started; every load fails with `reason`. */
export class UnavailableSink implements AudioSink {
  private volume = 1;

  public constructor(private readonly reason: string) {}

  public async start(): Promise<void> {}

  public async shutdown(): Promise<void> {}

  public async load(): Promise<void> {
    throw new Error(this.reason);
  }

  public async clear(): Promise<void> {}

  public async play(): Promise<void> {
    throw new Error(this.reason);
  }

  public async pause(): Promise<void> {}

  public isPaused(): boolean {
    return true;
  }

  public getPosition(): number {
    return 0;
  }

  public async trySeek(): Promise<boolean> {
    return false;
  }

  public getVolume(): number {
    return this.volume;
  }

  public async setVolume(volume: number): Promise<void> {
    this.volume = volume;
  }

  public subscribe(): () => void {
    return () => undefined;
  }
}
