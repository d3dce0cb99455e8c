import { ALL_SONGS_PLAYLIST } from "../../shared/constants.js";
import type { SearchField, SortCriteria, Track, ViewSnapshot } from "../../shared/types.js";
import { clampOffset, moveDown, moveUp, scrollIntoView } from "./list-navigation.js";
import type { PlaylistStore } from "./playlist-store.js";
import type { TrackCatalog } from "./track-catalog.js";

const SORT_CYCLE: SortCriteria[] = ["title", "artist", "duration", "shuffle"];
const SEARCH_FIELD_CYCLE: SearchField[] = ["title", "artist", "album"];

export type RandomSource = () => number;

function nextInCycle<T>(cycle: readonly T[], current: T): T {
  const index = cycle.indexOf(current);
  return cycle[(index + 1) % cycle.length] ?? current;
}

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function compareDuration(a: number | null, b: number | null): number {
  if (a == null || b == null || Number.isNaN(a) || Number.isNaN(b)) {
    return 0;
  }
  return a - b;
}

export function matchesSearch(track: Track, field: SearchField, needle: string): boolean {
  if (needle.length === 0) {
    return true;
  }
  return track[field].toLowerCase().includes(needle.toLowerCase());
}

export function sortTracks(tracks: Track[], criteria: Exclude<SortCriteria, "shuffle">): Track[] {
  switch (criteria) {
    case "title":
      return tracks.sort((a, b) => compareText(a.title, b.title));
    case "artist":
      return tracks.sort((a, b) => compareText(a.artist, b.artist));
    case "duration":
      return tracks.sort((a, b) => compareDuration(a.durationSec, b.durationSec));
    default:
      return tracks;
  }
}

export function shuffleInPlace<T>(items: T[], random: RandomSource = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j] as T, items[i] as T];
  }
  return items;
}

interface VisibleCache {
  key: string;
  tracks: Track[];
}

/**
 * Projection of the catalog the user sees: active playlist, search filter and
 * sort order, plus cursor and scroll state for the playlist and track lists.
 * Selection is tracked by id so it survives reordering and filtering.
 */
export class ViewModel {
  private searchText = "";
  private searchField: SearchField = "title";
  private sortCriteria: SortCriteria = "title";
  private activePlaylistIndex = 0;
  private playlistOffset = 0;
  private selectedTrackId: string | null = null;
  private trackOffset = 0;
  private trackCapacity = 10;
  private playlistCapacity = 5;
  private shuffleRank = new Map<string, number>();
  private shuffleGeneration = 0;
  private cache: VisibleCache | null = null;

  public constructor(
    private readonly catalog: TrackCatalog,
    private readonly playlists: PlaylistStore,
    private readonly random: RandomSource = Math.random
  ) {}

  public getSearchText(): string {
    return this.searchText;
  }

  public getSearchField(): SearchField {
    return this.searchField;
  }

  public getSortCriteria(): SortCriteria {
    return this.sortCriteria;
  }

  public getSelectedTrackId(): string | null {
    return this.selectedTrackId;
  }

  public getTrackOffset(): number {
    return this.trackOffset;
  }

  public getPlaylistOffset(): number {
    return this.playlistOffset;
  }

  public getActivePlaylistIndex(): number {
    return this.activePlaylistIndex;
  }

  public getActivePlaylistName(): string {
    return this.playlists.names()[this.activePlaylistIndex] ?? ALL_SONGS_PLAYLIST;
  }

  public visibleTracks(): Track[] {
    const playlistName = this.getActivePlaylistName();
    const key = [
      this.catalog.getRevision(),
      playlistName,
      this.playlists.get(playlistName)?.length ?? 0,
      this.searchField,
      this.searchText,
      this.sortCriteria,
      this.shuffleGeneration
    ].join("\u0000");

    if (this.cache?.key === key) {
      return this.cache.tracks;
    }

    const members = new Set(this.playlists.get(playlistName) ?? []);
    const filtered = this.catalog.getTracks().filter((track) => (
      (members.has(track.id) || (track.placeholder && playlistName === ALL_SONGS_PLAYLIST))
      && matchesSearch(track, this.searchField, this.searchText)
    ));

    const tracks = this.sortCriteria === "shuffle"
      ? filtered.sort((a, b) => (this.shuffleRank.get(a.id) ?? 0) - (this.shuffleRank.get(b.id) ?? 0))
      : sortTracks(filtered, this.sortCriteria);

    this.cache = { key, tracks };
    return tracks;
  }

  /** Call after the catalog or playlist membership changed under the view. */
  public invalidate(): void {
    this.cache = null;
    this.clampPlaylistIndex();
    this.reconcileSelection();
  }

  public setSearchText(text: string): void {
    if (text === this.searchText) {
      return;
    }
    this.searchText = text;
    this.reconcileSelection();
  }

  public appendSearchText(text: string): void {
    this.setSearchText(this.searchText + text);
  }

  public deleteSearchCharacter(): void {
    this.setSearchText([...this.searchText].slice(0, -1).join(""));
  }

  public setSearchField(field: SearchField): void {
    this.searchField = field;
    this.reconcileSelection();
  }

  public cycleSearchField(): SearchField {
    this.setSearchField(nextInCycle(SEARCH_FIELD_CYCLE, this.searchField));
    return this.searchField;
  }

  /** Selecting shuffle always draws a fresh permutation. */
  public setSortCriteria(criteria: SortCriteria): void {
    this.sortCriteria = criteria;
    if (criteria === "shuffle") {
      const ids = shuffleInPlace(this.catalog.getTracks().map((track) => track.id), this.random);
      this.shuffleRank = new Map(ids.map((id, rank) => [id, rank]));
      this.shuffleGeneration += 1;
    }
    this.keepSelectionVisible();
  }

  public cycleSort(): SortCriteria {
    this.setSortCriteria(nextInCycle(SORT_CYCLE, this.sortCriteria));
    return this.sortCriteria;
  }

  public setViewport(trackCapacity: number, playlistCapacity: number): void {
    this.trackCapacity = Math.max(1, Math.floor(trackCapacity));
    this.playlistCapacity = Math.max(1, Math.floor(playlistCapacity));
    this.trackOffset = clampOffset(this.trackOffset, this.visibleTracks().length, this.trackCapacity);
    this.playlistOffset = clampOffset(this.playlistOffset, this.playlists.names().length, this.playlistCapacity);
    this.keepSelectionVisible();
  }

  public moveSelection(delta: 1 | -1): void {
    const tracks = this.visibleTracks();
    const index = this.selectedIndex(tracks);
    const cursor = { index: index === -1 ? null : index, offset: this.trackOffset };
    const next = delta > 0
      ? moveDown(cursor, tracks.length, this.trackCapacity)
      : moveUp(cursor, tracks.length, this.trackCapacity);

    this.selectedTrackId = next.index === null ? null : tracks[next.index]?.id ?? null;
    this.trackOffset = next.offset;
  }

  /** Switching playlists clears the track selection. */
  public movePlaylist(delta: 1 | -1): void {
    const names = this.playlists.names();
    const cursor = { index: this.activePlaylistIndex, offset: this.playlistOffset };
    const next = delta > 0
      ? moveDown(cursor, names.length, this.playlistCapacity)
      : moveUp(cursor, names.length, this.playlistCapacity);

    this.activePlaylistIndex = next.index ?? 0;
    this.playlistOffset = next.offset;
    this.selectedTrackId = null;
    this.trackOffset = 0;
  }

  public selectPlaylist(index: number): void {
    this.activePlaylistIndex = index;
    this.clampPlaylistIndex();
    this.playlistOffset = scrollIntoView(
      this.activePlaylistIndex,
      this.playlistOffset,
      this.playlists.names().length,
      this.playlistCapacity
    );
    this.selectedTrackId = null;
    this.trackOffset = 0;
  }

  /** Selects a visible track and scrolls it into the viewport. */
  public selectTrack(trackId: string | null): void {
    if (trackId === null) {
      this.selectedTrackId = null;
      return;
    }

    if (this.visibleTracks().some((track) => track.id === trackId)) {
      this.selectedTrackId = trackId;
      this.keepSelectionVisible();
    }
  }

  public snapshot(): ViewSnapshot {
    return {
      searchText: this.searchText,
      searchField: this.searchField,
      sortCriteria: this.sortCriteria,
      playlists: this.playlists.names(),
      activePlaylistIndex: this.activePlaylistIndex,
      playlistOffset: this.playlistOffset,
      tracks: this.visibleTracks(),
      selectedTrackId: this.selectedTrackId,
      trackOffset: this.trackOffset,
      trackCapacity: this.trackCapacity,
      playlistCapacity: this.playlistCapacity
    };
  }

  /**
   * Keeps the selected id when it is still visible; otherwise falls back to
   * the first visible track, or to no selection for an empty view.
   */
  private reconcileSelection(): void {
    const tracks = this.visibleTracks();
    if (this.selectedTrackId && tracks.some((track) => track.id === this.selectedTrackId)) {
      this.keepSelectionVisible();
      return;
    }

    this.selectedTrackId = tracks[0]?.id ?? null;
    this.trackOffset = 0;
  }

  private keepSelectionVisible(): void {
    const tracks = this.visibleTracks();
    const index = this.selectedIndex(tracks);
    this.trackOffset = index === -1
      ? clampOffset(this.trackOffset, tracks.length, this.trackCapacity)
      : scrollIntoView(index, this.trackOffset, tracks.length, this.trackCapacity);
  }

  private selectedIndex(tracks: readonly Track[]): number {
    return this.selectedTrackId ? tracks.findIndex((track) => track.id === this.selectedTrackId) : -1;
  }

  private clampPlaylistIndex(): void {
    const count = this.playlists.names().length;
    if (this.activePlaylistIndex >= count || this.activePlaylistIndex < 0) {
      this.activePlaylistIndex = 0;
    }
    this.playlistOffset = clampOffset(this.playlistOffset, count, this.playlistCapacity);
  }
}
