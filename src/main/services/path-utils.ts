import path from "node:path";
import { promises as fs, type Dirent } from "node:fs";
import { SUPPORTED_AUDIO_EXTENSIONS } from "../../shared/constants.js";

export function isAudioFile(filePath: string): boolean {
  return SUPPORTED_AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export function normalizePath(filePath: string): string {
  return path.resolve(filePath);
}

export class DirectoryReadError extends Error {
  public constructor(public readonly directory: string, cause: unknown) {
    super(`Unable to read directory ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "DirectoryReadError";
  }
}

/**
 * Lists supported audio files under `rootPath`, sorted by path.
 * Throws `DirectoryReadError` only when the root itself is unreadable;
 * unreadable subdirectories are skipped and reported through `onSkip`.
 */
export async function listAudioFiles(
  rootPath: string,
  options: { recursive: boolean; onSkip?: (directory: string, error: unknown) => void }
): Promise<string[]> {
  const normalized = normalizePath(rootPath);
  const results: string[] = [];
  const stack = [normalized];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      continue;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (current === normalized) {
        throw new DirectoryReadError(current, error);
      }
      options.onSkip?.(current, error);
      continue;
    }

    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive) {
          stack.push(full);
        }
      } else if (entry.isFile() && isAudioFile(full)) {
        results.push(full);
      }
    }
  }

  results.sort((a, b) => a.localeCompare(b));
  return results;
}
