import path from "node:path";
import { promises as fs, type Dirent } from "node:fs";
import type { CoverArt } from "../../shared/types.js";

const MIME_TYPE_BY_EXTENSION: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".gif": "image/gif"
};

const PRIORITIZED_BASENAMES = ["cover", "folder", "front", "album"];

function rankImageName(fileName: string): number | null {
  const extension = path.extname(fileName).toLowerCase();
  if (!(extension in MIME_TYPE_BY_EXTENSION)) {
    return null;
  }

  const baseName = path.basename(fileName, extension).toLowerCase();
  const exact = PRIORITIZED_BASENAMES.indexOf(baseName);
  if (exact >= 0) {
    return exact;
  }

  const partial = PRIORITIZED_BASENAMES.findIndex((token) => baseName.includes(token));
  return partial >= 0 ? 100 + partial : 1000;
}

export class CoverArtService {
  private readonly directoryCache = new Map<string, CoverArt | null>();

  /** Embedded art wins; otherwise the best-named image beside the track. */
  public async resolve(trackPath: string, embeddedMimeType: string | null): Promise<CoverArt | null> {
    if (embeddedMimeType) {
      return { source: "embedded", mimeType: embeddedMimeType, location: trackPath };
    }

    return await this.resolveFolderImage(path.dirname(trackPath));
  }

  public clearCache(): void {
    this.directoryCache.clear();
  }

  private async resolveFolderImage(directory: string): Promise<CoverArt | null> {
    const cached = this.directoryCache.get(directory);
    if (cached !== undefined) {
      return cached;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch {
      this.directoryCache.set(directory, null);
      return null;
    }

    let best: { name: string; rank: number } | null = null;
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const rank = rankImageName(entry.name);
      if (rank == null) {
        continue;
      }

      if (!best || rank < best.rank || (rank === best.rank && entry.name.localeCompare(best.name) < 0)) {
        best = { name: entry.name, rank };
      }
    }

    const resolved: CoverArt | null = best
      ? {
        source: "folder",
        mimeType: MIME_TYPE_BY_EXTENSION[path.extname(best.name).toLowerCase()] ?? "application/octet-stream",
        location: path.join(directory, best.name)
      }
      : null;
    this.directoryCache.set(directory, resolved);
    return resolved;
  }
}
