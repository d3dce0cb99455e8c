import { setInterval as every } from "node:timers/promises";
import { createLogger } from "./logger.js";

const log = createLogger("ticks");

export type TickListener = () => void;

/**
 * Background producer of periodic ticks. Ticks land in a single slot, so a
 * consumer that falls behind sees one pending tick rather than a backlog.
 */
export class TickSource {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private pending = false;
  private readonly listeners = new Set<TickListener>();

  public constructor(private readonly intervalMs: number) {}

  public isRunning(): boolean {
    return this.controller !== null;
  }

  public onTick(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public start(): void {
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /** Signals the producer and resolves once its loop has exited. */
  public async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) {
      return;
    }

    this.controller = null;
    this.loop = null;
    controller.abort();
    await loop;
    this.pending = false;
  }

  /** Takes the pending tick, if any. */
  public drain(): boolean {
    const taken = this.pending;
    this.pending = false;
    return taken;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      for await (const _ of every(this.intervalMs, undefined, { signal })) {
        this.pending = true;
        for (const listener of this.listeners) {
          listener();
        }
      }
    } catch (error) {
      if (!signal.aborted) {
        log.error("Tick loop failed", error);
      }
    }
  }
}
