import path from "node:path";
import { UNKNOWN_ALBUM, UNKNOWN_ARTIST } from "../../shared/constants.js";
import type { Track } from "../../shared/types.js";
import { CoverArtService } from "./cover-art-service.js";
import { createLogger } from "./logger.js";
import { MetadataLoadQueue } from "./metadata-load-queue.js";
import { titleFromPath, type TagData, type TagReader } from "./metadata-service.js";
import { listAudioFiles, normalizePath } from "./path-utils.js";
import { trackIdFromPath } from "./track-id.js";

const log = createLogger("catalog");

const TAG_READ_CONCURRENCY = 4;

export interface ScanOptions {
  recursive: boolean;
}

export function createTrack(filePath: string, tags: TagData | null): Track {
  return {
    id: trackIdFromPath(filePath),
    title: tags?.title ?? titleFromPath(filePath),
    artist: tags?.artist ?? UNKNOWN_ARTIST,
    album: tags?.album ?? UNKNOWN_ALBUM,
    durationSec: tags?.durationSec ?? null,
    path: filePath,
    cover: null,
    isPlaying: false,
    placeholder: false
  };
}

export function createPlaceholderTrack(directory: string): Track {
  return {
    id: trackIdFromPath(""),
    title: `No music found in "${directory}"`,
    artist: UNKNOWN_ARTIST,
    album: UNKNOWN_ALBUM,
    durationSec: null,
    path: "",
    cover: null,
    isPlaying: false,
    placeholder: true
  };
}

export class TrackCatalog {
  private tracks: Track[] = [];
  private readonly indexById = new Map<string, number>();
  private playingTrackId: string | null = null;
  private revision = 0;

  public constructor(
    private readonly tagReader: TagReader,
    private readonly coverArtService = new CoverArtService()
  ) {}

  /**
   * Replaces the catalog with the audio files of `directory`. Files whose tags
   * cannot be read are kept under their file name; an unreadable or empty
   * directory yields the single placeholder track.
   */
  public async scan(directory: string, options: ScanOptions = { recursive: false }): Promise<Track[]> {
    const root = normalizePath(directory);

    let files: string[] = [];
    try {
      files = await listAudioFiles(root, {
        recursive: options.recursive,
        onSkip: (skipped, error) => log.warn(`Skipping unreadable directory ${skipped}`, error)
      });
    } catch (error) {
      log.warn(`Unable to scan ${root}`, error);
    }

    const queue = new MetadataLoadQueue<TagData>({
      concurrency: TAG_READ_CONCURRENCY,
      runTask: (filePath) => this.tagReader.read(filePath)
    });
    const results = await queue.loadAll(files);

    const tracks: Track[] = [];
    for (const result of results) {
      if (!result.ok) {
        log.warn(`Unreadable tags in ${path.basename(result.filePath)}`, result.error);
      }

      const tags = result.ok ? result.value : null;
      const track = createTrack(result.filePath, tags);
      track.cover = await this.coverArtService.resolve(result.filePath, tags?.coverMimeType ?? null);
      tracks.push(track);
    }

    if (tracks.length === 0) {
      tracks.push(createPlaceholderTrack(root));
    }

    log.info(`Scanned ${root}: ${files.length} audio file(s)`);
    this.replace(tracks);
    return this.tracks;
  }

  public replace(tracks: Track[]): void {
    this.tracks = tracks;
    this.indexById.clear();
    for (const [index, track] of tracks.entries()) {
      this.indexById.set(track.id, index);
    }

    this.playingTrackId = tracks.find((track) => track.isPlaying)?.id ?? null;
    this.revision += 1;
  }

  public getTracks(): readonly Track[] {
    return this.tracks;
  }

  public getRevision(): number {
    return this.revision;
  }

  public getById(trackId: string): Track | null {
    const index = this.indexById.get(trackId);
    return index === undefined ? null : this.tracks[index] ?? null;
  }

  public has(trackId: string): boolean {
    return this.indexById.has(trackId);
  }

  public allIds(): string[] {
    return this.tracks.filter((track) => !track.placeholder).map((track) => track.id);
  }

  public getPlayingTrackId(): string | null {
    return this.playingTrackId;
  }

  /** At most one track carries `isPlaying`; passing `null` clears it. */
  public setPlaying(trackId: string | null): void {
    if (this.playingTrackId) {
      const previous = this.getById(this.playingTrackId);
      if (previous) {
        previous.isPlaying = false;
      }
    }

    const next = trackId ? this.getById(trackId) : null;
    if (next) {
      next.isPlaying = true;
    }
    this.playingTrackId = next?.id ?? null;
  }
}
