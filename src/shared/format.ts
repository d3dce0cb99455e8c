export function formatDuration(totalSeconds: number | null): string {
  if (totalSeconds == null || !Number.isFinite(totalSeconds) || totalSeconds < 0) {
    return "--:--";
  }

  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remaining = seconds % 60;

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
  }

  return `${String(minutes).padStart(2, "0")}:${String(remaining).padStart(2, "0")}`;
}

export function formatProgress(elapsedSec: number, durationSec: number | null): string {
  return `${formatDuration(elapsedSec)}/${formatDuration(durationSec)}`;
}

export function formatVolume(volume: number): string {
  return `${Math.round(clamp(volume, 0, 1) * 100)}%`;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function ratio(part: number, whole: number | null): number {
  if (whole == null || !Number.isFinite(whole) || whole <= 0) {
    return 0;
  }
  return clamp(part / whole, 0, 1);
}

export function formatGauge(fraction: number, width: number): string {
  const cells = Math.max(0, Math.floor(width));
  const filled = Math.round(clamp(Number.isFinite(fraction) ? fraction : 0, 0, 1) * cells);
  return "\u2588".repeat(filled) + "\u2591".repeat(cells - filled);
}
