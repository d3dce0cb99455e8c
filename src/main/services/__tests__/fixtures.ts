import type { Track } from "../../../shared/types.js";
import type { TagData, TagReader } from "../metadata-service.js";
import { PlaylistStore } from "../playlist-store.js";
import { createTrack, TrackCatalog } from "../track-catalog.js";
import { ViewModel } from "../view-model.js";

export function makeTrack(title: string, durationSec: number | null, artist = "Test Artist", album = "Test Album"): Track {
  return createTrack(`/music/${title}.mp3`, {
    title,
    artist,
    album,
    durationSec,
    coverMimeType: null
  });
}

export class FakeTagReader implements TagReader {
  public readonly reads: string[] = [];

  public constructor(private readonly tagsByName: Record<string, TagData | Error> = {}) {}

  public async read(filePath: string): Promise<TagData> {
    this.reads.push(filePath);
    const name = filePath.split("/").at(-1) ?? filePath;
    const tags = this.tagsByName[name];
    if (tags instanceof Error) {
      throw tags;
    }
    return tags ?? {
      title: null,
      artist: null,
      album: null,
      durationSec: null,
      coverMimeType: null
    };
  }
}

export interface LibraryFixture {
  catalog: TrackCatalog;
  playlists: PlaylistStore;
  view: ViewModel;
}

/** Catalog, playlists and view wired together over in-memory tracks. */
export function createLibrary(tracks: Track[], random: () => number = () => 0): LibraryFixture {
  const catalog = new TrackCatalog(new FakeTagReader());
  catalog.replace(tracks);

  const playlists = new PlaylistStore("/nonexistent/termtune/playlists.json");
  playlists.setAllSongs(catalog.allIds());

  const view = new ViewModel(catalog, playlists, random);
  view.setViewport(3, 2);
  view.invalidate();

  return { catalog, playlists, view };
}
