import path from "node:path";
import { parseFile } from "music-metadata";

export interface TagData {
  title: string | null;
  artist: string | null;
  album: string | null;
  durationSec: number | null;
  coverMimeType: string | null;
}

export interface TagReader {
  read(filePath: string): Promise<TagData>;
}

export function parseText(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function parseDuration(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return null;
  }

  return value;
}

export function titleFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export class MetadataService implements TagReader {
  private readonly inFlight = new Map<string, Promise<TagData>>();

  public async read(filePath: string): Promise<TagData> {
    const pending = this.inFlight.get(filePath);
    if (pending) {
      return await pending;
    }

    const loader = this.parse(filePath);
    this.inFlight.set(filePath, loader);
    try {
      return await loader;
    } finally {
      this.inFlight.delete(filePath);
    }
  }

  private async parse(filePath: string): Promise<TagData> {
    const parsed = await parseFile(filePath, {
      duration: true,
      skipCovers: false
    });

    const artist = parseText(parsed.common.artist)
      ?? parseText(parsed.common.albumartist)
      ?? parseText(parsed.common.artists?.join(", "));

    return {
      title: parseText(parsed.common.title),
      artist,
      album: parseText(parsed.common.album),
      durationSec: parseDuration(parsed.format.duration),
      coverMimeType: parseText(parsed.common.picture?.[0]?.format)
    };
  }
}
