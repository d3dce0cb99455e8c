import net from "node:net";
import os from "node:os";
import path from "node:path";
import { EventEmitter } from "node:events";
import { spawn, type ChildProcess } from "node:child_process";
import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import { clamp } from "../../../shared/format.js";
import { createLogger } from "../logger.js";
import type { AudioSink, AudioSinkEvent } from "./backend.js";

const log = createLogger("mpv");

interface MpvMessage {
  request_id?: number;
  error?: string;
  data?: unknown;
  event?: string;
  name?: string;
  reason?: string;
  file_error?: string;
}

interface PendingRequestHandlers {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  timeout: NodeJS.Timeout;
}

interface LoadWaiter {
  resolve: () => void;
  reject: (reason: Error) => void;
  timeout: NodeJS.Timeout;
}

const MPV_COMMAND_TIMEOUT_MS = 5000;
const MPV_LOAD_TIMEOUT_MS = 4000;

const OBSERVE_PROPERTIES: Array<{ id: number; name: string }> = [
  { id: 1, name: "pause" },
  { id: 2, name: "time-pos" },
  { id: 3, name: "volume" }
];

export class MpvIpcBackend implements AudioSink {
  private readonly events = new EventEmitter();
  private readonly socketPath: string;
  private mpvProcess: ChildProcess | null = null;
  private socket: net.Socket | null = null;
  private connected = false;
  private responseBuffer = "";
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingRequestHandlers>();
  private loadWaiter: LoadWaiter | null = null;
  private paused = true;
  private positionSec = 0;
  private volume = 1;
  private shuttingDown = false;
  private spawnError: Error | null = null;

  public constructor(private readonly executable = "mpv") {
    this.socketPath = path.join(os.tmpdir(), `termtune-mpv-${randomUUID()}.sock`);
  }

  public async start(): Promise<void> {
    this.shuttingDown = false;
    this.spawnError = null;
    await this.removeSocketIfNeeded();

    const child = spawn(this.executable, [
      "--idle=yes",
      "--no-video",
      "--no-terminal",
      "--really-quiet",
      `--input-ipc-server=${this.socketPath}`
    ], { stdio: "ignore" });
    this.mpvProcess = child;

    child.on("error", (error) => {
      const failure = new Error(`mpv process error: ${error.message}`);
      this.spawnError = failure;
      this.failAll(failure);
      this.emit({ type: "error", message: failure.message });
    });

    child.on("exit", (code, signal) => {
      this.connected = false;
      this.failAll(new Error("mpv exited before replying to pending command(s)."));
      if (this.shuttingDown) {
        return;
      }
      this.emit({
        type: "error",
        message: `mpv exited unexpectedly (code=${code ?? "n/a"}, signal=${signal ?? "n/a"})`
      });
    });

    await this.connectSocketWithRetry();
    for (const property of OBSERVE_PROPERTIES) {
      await this.sendCommand(["observe_property", property.id, property.name]);
    }
  }

  public async shutdown(): Promise<void> {
    this.shuttingDown = true;

    if (this.connected) {
      await Promise.race([
        this.sendCommand(["quit"]).catch(() => undefined),
        new Promise<void>((resolve) => setTimeout(resolve, 500))
      ]);
    }

    this.failAll(new Error("mpv request canceled during shutdown."));

    this.socket?.destroy();
    this.socket = null;
    this.connected = false;

    if (this.mpvProcess) {
      this.mpvProcess.kill("SIGTERM");
      this.mpvProcess = null;
    }

    await this.removeSocketIfNeeded();
  }

  /** Loads paused; resolves once mpv reports the file decodable. */
  public async load(filePath: string): Promise<void> {
    await this.sendCommand(["set_property", "pause", true]);
    this.paused = true;
    this.positionSec = 0;

    const loaded = this.waitForLoad();
    try {
      await this.sendCommand(["loadfile", filePath, "replace"]);
    } catch (error) {
      loaded.catch(() => undefined);
      this.settleLoad(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
    await loaded;
  }

  public async clear(): Promise<void> {
    await this.sendCommand(["stop"]);
    this.positionSec = 0;
  }

  public async play(): Promise<void> {
    await this.sendCommand(["set_property", "pause", false]);
    this.paused = false;
  }

  public async pause(): Promise<void> {
    await this.sendCommand(["set_property", "pause", true]);
    this.paused = true;
  }

  public isPaused(): boolean {
    return this.paused;
  }

  public getPosition(): number {
    return this.positionSec;
  }

  public async trySeek(positionSec: number): Promise<boolean> {
    try {
      await this.sendCommand(["seek", positionSec, "absolute"]);
      this.positionSec = positionSec;
      return true;
    } catch (error) {
      log.debug("Seek rejected", error);
      return false;
    }
  }

  public getVolume(): number {
    return this.volume;
  }

  public async setVolume(volume: number): Promise<void> {
    const next = clamp(volume, 0, 1);
    await this.sendCommand(["set_property", "volume", Math.round(next * 100)]);
    this.volume = next;
  }

  public subscribe(listener: (event: AudioSinkEvent) => void): () => void {
    this.events.on("event", listener);
    return () => {
      this.events.off("event", listener);
    };
  }

  private emit(event: AudioSinkEvent): void {
    this.events.emit("event", event);
  }

  private waitForLoad(): Promise<void> {
    this.settleLoad(new Error("Superseded by another load."));

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.settleLoad(new Error("Timed out waiting for mpv to load the file."));
      }, MPV_LOAD_TIMEOUT_MS);
      this.loadWaiter = { resolve, reject, timeout };
    });
  }

  private settleLoad(error: Error | null): void {
    const waiter = this.loadWaiter;
    if (!waiter) {
      return;
    }

    this.loadWaiter = null;
    clearTimeout(waiter.timeout);
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve();
    }
  }

  private async connectSocketWithRetry(): Promise<void> {
    const maxAttempts = 100;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (this.spawnError) {
        throw this.spawnError;
      }
      try {
        await this.tryConnectSocket();
        this.connected = true;
        return;
      } catch {
        await new Promise((resolve) => setTimeout(resolve, 50));
      }
    }

    throw new Error("Failed to connect to mpv IPC socket.");
  }

  private async tryConnectSocket(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);

      socket.once("error", (error) => {
        socket.destroy();
        reject(error);
      });

      socket.once("connect", () => {
        this.socket = socket;
        socket.setEncoding("utf8");
        socket.removeAllListeners("error");

        socket.on("data", (chunk) => {
          this.onSocketData(chunk.toString());
        });

        socket.on("close", () => {
          this.connected = false;
          this.failAll(new Error("mpv IPC socket closed."));
        });

        socket.on("error", (error) => {
          this.failAll(new Error(`mpv socket error: ${error.message}`));
          this.emit({ type: "error", message: `mpv socket error: ${error.message}` });
        });

        resolve();
      });
    });
  }

  private onSocketData(chunk: string): void {
    this.responseBuffer += chunk;

    let newlineIndex = this.responseBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      const line = this.responseBuffer.slice(0, newlineIndex).trim();
      this.responseBuffer = this.responseBuffer.slice(newlineIndex + 1);
      if (line) {
        this.handleMessage(line);
      }
      newlineIndex = this.responseBuffer.indexOf("\n");
    }
  }

  private handleMessage(line: string): void {
    let parsed: MpvMessage;
    try {
      parsed = JSON.parse(line) as MpvMessage;
    } catch {
      log.debug(`Ignoring malformed IPC line: ${line}`);
      return;
    }

    if (typeof parsed.request_id === "number") {
      const handlers = this.pending.get(parsed.request_id);
      if (handlers) {
        this.pending.delete(parsed.request_id);
        clearTimeout(handlers.timeout);
        if (parsed.error && parsed.error !== "success") {
          handlers.reject(new Error(parsed.error));
        } else {
          handlers.resolve(parsed.data);
        }
      }
      return;
    }

    switch (parsed.event) {
      case "property-change":
        this.applyProperty(parsed.name, parsed.data);
        return;
      case "file-loaded":
        this.settleLoad(null);
        return;
      case "end-file": {
        const reason = parsed.reason ?? "unknown";
        if (reason === "error") {
          this.settleLoad(new Error(`mpv could not play the file: ${parsed.file_error ?? "unknown error"}`));
        }
        this.emit({ type: "endOfFile", reason });
        return;
      }
      default:
        return;
    }
  }

  private applyProperty(name: string | undefined, data: unknown): void {
    switch (name) {
      case "pause":
        this.paused = Boolean(data);
        return;
      case "time-pos":
        this.positionSec = typeof data === "number" && Number.isFinite(data) ? Math.max(0, data) : 0;
        return;
      case "volume":
        if (typeof data === "number" && Number.isFinite(data)) {
          this.volume = clamp(data / 100, 0, 1);
        }
        return;
      default:
        return;
    }
  }

  private async sendCommand(command: unknown[]): Promise<unknown> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      throw new Error("mpv IPC socket is not connected.");
    }

    const requestId = this.nextRequestId;
    this.nextRequestId += 1;

    const payload = JSON.stringify({ command, request_id: requestId }) + "\n";
    const commandLabel = typeof command[0] === "string" ? command[0] : "unknown";

    const reply = new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        if (this.pending.delete(requestId)) {
          reject(new Error(`mpv command timed out: ${commandLabel}`));
        }
      }, MPV_COMMAND_TIMEOUT_MS);

      this.pending.set(requestId, { resolve, reject, timeout });
    });

    await new Promise<void>((resolve, reject) => {
      socket.write(payload, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    }).catch((error: unknown) => {
      const handlers = this.pending.get(requestId);
      if (handlers) {
        this.pending.delete(requestId);
        clearTimeout(handlers.timeout);
      }
      throw error;
    });

    return await reply;
  }

  private failAll(reason: Error): void {
    for (const handlers of this.pending.values()) {
      clearTimeout(handlers.timeout);
      handlers.reject(reason);
    }
    this.pending.clear();
    this.settleLoad(reason);
  }

  private async removeSocketIfNeeded(): Promise<void> {
    await fs.rm(this.socketPath, { force: true });
  }
}
