import path from "node:path";
import { clamp } from "../../shared/format.js";
import type { AppSettings } from "../../shared/types.js";
import { isLogLevel } from "./logger.js";

export type SettingsCandidate = { [K in keyof AppSettings]?: unknown };

function asFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }

  return fallback;
}

function asNormalizedPath(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.trim().length > 0) {
    return path.resolve(value);
  }

  return path.resolve(fallback);
}

function roundToHundredth(value: number): number {
  return Math.round(value * 100) / 100;
}

export function sanitizeAppSettings(candidate: SettingsCandidate, defaults: AppSettings): AppSettings {
  return {
    musicRoot: asNormalizedPath(candidate.musicRoot, defaults.musicRoot),
    scanRecursive: asBoolean(candidate.scanRecursive, defaults.scanRecursive),
    seekStepSec: clamp(Math.round(asFiniteNumber(candidate.seekStepSec, defaults.seekStepSec)), 1, 60),
    tickIntervalMs: clamp(Math.round(asFiniteNumber(candidate.tickIntervalMs, defaults.tickIntervalMs)), 20, 1000),
    initialVolume: roundToHundredth(clamp(asFiniteNumber(candidate.initialVolume, defaults.initialVolume), 0, 1)),
    logLevel: isLogLevel(candidate.logLevel) ? candidate.logLevel : defaults.logLevel
  };
}

/** `TERMTUNE_MUSIC_DIR` and `TERMTUNE_LOG_LEVEL` win over the stored file. */
export function applyEnvironmentOverrides(settings: AppSettings, env: NodeJS.ProcessEnv): AppSettings {
  const musicRoot = env.TERMTUNE_MUSIC_DIR?.trim();
  const logLevel = env.TERMTUNE_LOG_LEVEL?.trim().toLowerCase();

  return {
    ...settings,
    musicRoot: musicRoot ? path.resolve(musicRoot) : settings.musicRoot,
    logLevel: isLogLevel(logLevel) ? logLevel : settings.logLevel
  };
}
