import path from "node:path";
import { promises as fs } from "node:fs";
import { ALL_SONGS_PLAYLIST } from "../../shared/constants.js";
import type { PlaylistEntry } from "../../shared/types.js";
import { createLogger } from "./logger.js";
import { trackIdFromPath } from "./track-id.js";

const log = createLogger("playlists");

export type PlaylistValidationReason = "missing-both" | "missing-name" | "missing-tracks" | "reserved-name";

const VALIDATION_MESSAGES: Record<PlaylistValidationReason, string> = {
  "missing-both": "Need a name and at least 1 song",
  "missing-name": "Need a name",
  "missing-tracks": "Need at least 1 song",
  "reserved-name": `"${ALL_SONGS_PLAYLIST}" is reserved`
};

export class PlaylistValidationError extends Error {
  public constructor(public readonly reason: PlaylistValidationReason) {
    super(VALIDATION_MESSAGES[reason]);
    this.name = "PlaylistValidationError";
  }
}

interface PersistedPlaylistsV1 {
  version: 1;
  playlists: Record<string, string[]>;
}

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function uniqueIds(trackIds: readonly string[]): string[] {
  return [...new Set(trackIds)];
}

function toTrackIds(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  return uniqueIds(value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0));
}

export function sanitizePlaylistFileName(name: string): string {
  const cleaned = name.replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_").trim();
  return cleaned.length > 0 && cleaned !== "." && cleaned !== ".." ? cleaned : "playlist";
}

/** Parses a persisted document, dropping anything with the wrong shape. */
export function parsePlaylistDocument(raw: string): Map<string, string[]> {
  const result = new Map<string, string[]>();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return result;
  }

  if (!parsed || typeof parsed !== "object" || (parsed as { version?: unknown }).version !== 1) {
    return result;
  }

  const playlists = (parsed as { playlists?: unknown }).playlists;
  if (!playlists || typeof playlists !== "object" || Array.isArray(playlists)) {
    return result;
  }

  for (const [name, value] of Object.entries(playlists)) {
    const trackIds = toTrackIds(value);
    if (name.trim().length === 0 || name === ALL_SONGS_PLAYLIST || !trackIds) {
      continue;
    }
    result.set(name, trackIds);
  }

  return result;
}

export class PlaylistStore {
  private readonly playlists = new Map<string, string[]>();
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(private readonly storePath: string) {
    this.playlists.set(ALL_SONGS_PLAYLIST, []);
  }

  public getPath(): string {
    return this.storePath;
  }

  /** Regenerates the distinguished playlist from the current catalog. */
  public setAllSongs(trackIds: readonly string[]): void {
    this.playlists.set(ALL_SONGS_PLAYLIST, uniqueIds(trackIds));
  }

  public names(): string[] {
    return [...this.playlists.keys()].sort(compareNames);
  }

  public get(name: string): readonly string[] | null {
    return this.playlists.get(name) ?? null;
  }

  public has(name: string): boolean {
    return this.playlists.has(name);
  }

  public entries(): PlaylistEntry[] {
    return this.names().map((name) => ({ name, trackIds: [...(this.playlists.get(name) ?? [])] }));
  }

  public validate(name: string, trackIds: readonly string[]): PlaylistValidationReason | null {
    const missingName = name.trim().length === 0;
    const missingTracks = trackIds.length === 0;

    if (missingName && missingTracks) {
      return "missing-both";
    }
    if (missingName) {
      return "missing-name";
    }
    if (missingTracks) {
      return "missing-tracks";
    }
    if (name === ALL_SONGS_PLAYLIST) {
      return "reserved-name";
    }
    return null;
  }

  public create(name: string, trackIds: readonly string[]): PlaylistEntry {
    const reason = this.validate(name, trackIds);
    if (reason) {
      throw new PlaylistValidationError(reason);
    }

    const entry = { name, trackIds: uniqueIds(trackIds) };
    this.playlists.set(entry.name, entry.trackIds);
    return { name: entry.name, trackIds: [...entry.trackIds] };
  }

  /**
   * Removes a user playlist, rewrites the persisted document and drops a
   * `<name>.m3u` manifest beside it.
   */
  public async delete(name: string): Promise<boolean> {
    if (name === ALL_SONGS_PLAYLIST || !this.playlists.delete(name)) {
      return false;
    }

    await this.persist();
    await fs.rm(this.manifestPath(name), { force: true });
    return true;
  }

  public manifestPath(name: string): string {
    return path.join(path.dirname(this.storePath), `${sanitizePlaylistFileName(name)}.m3u`);
  }

  public async persist(): Promise<void> {
    // fromEntries defines own keys, so names like "__proto__" survive.
    const document: PersistedPlaylistsV1 = {
      version: 1,
      playlists: Object.fromEntries(
        this.names()
          .filter((name) => name !== ALL_SONGS_PLAYLIST)
          .map((name) => [name, [...(this.playlists.get(name) ?? [])]])
      )
    };

    const run = async (): Promise<void> => {
      const tempPath = `${this.storePath}.${process.pid}.${Date.now()}.tmp`;
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });

      try {
        await fs.writeFile(tempPath, JSON.stringify(document, null, 2), "utf8");
        await fs.rename(tempPath, this.storePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    };

    this.writeQueue = this.writeQueue.catch(() => undefined).then(run);
    await this.writeQueue;
  }

  /** Loads user playlists; a missing or corrupt store yields none. */
  public async restore(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        log.warn(`Unable to read ${this.storePath}`, error);
      }
      raw = "";
    }

    const allSongs = this.playlists.get(ALL_SONGS_PLAYLIST) ?? [];
    this.playlists.clear();
    this.playlists.set(ALL_SONGS_PLAYLIST, allSongs);

    const restored = raw ? parsePlaylistDocument(raw) : new Map<string, string[]>();
    for (const [name, trackIds] of restored) {
      this.playlists.set(name, trackIds);
    }
    log.info(`Restored ${restored.size} playlist(s)`);
  }

  /** Writes `<name>.m3u` with one absolute path per resolvable track. */
  public async exportM3u(
    name: string,
    directory: string,
    resolvePath: (trackId: string) => string | null
  ): Promise<string> {
    const trackIds = this.playlists.get(name);
    if (!trackIds) {
      throw new Error(`Unknown playlist: ${name}`);
    }

    const lines = ["#EXTM3U"];
    for (const trackId of trackIds) {
      const filePath = resolvePath(trackId);
      if (filePath) {
        lines.push(filePath);
      }
    }

    const target = path.join(directory, `${sanitizePlaylistFileName(name)}.m3u`);
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(target, `${lines.join("\n")}\n`, "utf8");
    return target;
  }

  /** Reads an M3U manifest, hashing each path into a track id. */
  public async importM3u(filePath: string): Promise<PlaylistEntry> {
    const content = await fs.readFile(filePath, "utf8");
    const trackIds = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"))
      .map((line) => trackIdFromPath(path.resolve(path.dirname(filePath), line)));

    return this.create(path.basename(filePath, path.extname(filePath)), trackIds);
  }
}
