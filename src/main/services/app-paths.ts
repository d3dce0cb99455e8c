import os from "node:os";
import path from "node:path";
import { APP_NAME } from "../../shared/constants.js";

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.TERMTUNE_CONFIG_DIR?.trim();
  if (explicit) {
    return path.resolve(explicit);
  }

  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) {
    return path.join(path.resolve(xdg), APP_NAME);
  }

  return path.join(os.homedir(), ".config", APP_NAME);
}

export function defaultMusicRoot(): string {
  return path.join(os.homedir(), "Music");
}
