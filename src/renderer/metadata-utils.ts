import { SEARCH_FIELD_LABELS, SORT_LABELS } from "../shared/constants.js";
import type { CoverArt, SearchField, SortCriteria, Track } from "../shared/types.js";

export function searchFieldLabel(field: SearchField): string {
  return SEARCH_FIELD_LABELS[field];
}

export function sortLabel(criteria: SortCriteria): string {
  return SORT_LABELS[criteria];
}

export function fileNameFromPath(filePath: string): string {
  const normalized = filePath.replaceAll("\\", "/");
  const fileName = normalized.split("/").at(-1);
  return fileName && fileName.length > 0 ? fileName : filePath;
}

export function trackSummary(track: Track): string {
  return track.placeholder ? track.title : `${track.title} - ${track.artist}`;
}

export function coverDescription(cover: CoverArt | null): string {
  if (!cover) {
    return "none";
  }

  return cover.source === "embedded"
    ? `embedded ${cover.mimeType}`
    : fileNameFromPath(cover.location);
}
