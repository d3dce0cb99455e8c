import path from "node:path";
import { promises as fs } from "node:fs";
import { DEFAULT_SETTINGS } from "../../shared/constants.js";
import type { AppSettings } from "../../shared/types.js";
import { defaultMusicRoot } from "./app-paths.js";
import { createLogger } from "./logger.js";
import { applyEnvironmentOverrides, sanitizeAppSettings, type SettingsCandidate } from "./settings-utils.js";

const SETTINGS_FILE = "config.json";

const log = createLogger("config");

export class ConfigStore {
  private readonly configPath: string;
  private readonly defaults: AppSettings;

  public constructor(configDir: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.configPath = path.join(configDir, SETTINGS_FILE);
    const base: AppSettings = {
      ...DEFAULT_SETTINGS,
      musicRoot: defaultMusicRoot()
    };
    this.defaults = sanitizeAppSettings(base, base);
  }

  public getDefaults(): AppSettings {
    return {
      ...this.defaults
    };
  }

  /** Stored settings with environment overrides applied; defaults when the file is missing or corrupt. */
  public async load(): Promise<AppSettings> {
    let stored = this.getDefaults();
    try {
      const data = await fs.readFile(this.configPath, "utf8");
      const parsed: unknown = JSON.parse(data);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        stored = sanitizeAppSettings(parsed as SettingsCandidate, this.defaults);
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        log.warn(`Ignoring unreadable ${this.configPath}`, error);
      }
    }

    return applyEnvironmentOverrides(stored, this.env);
  }

  public async save(next: AppSettings): Promise<void> {
    const validated = sanitizeAppSettings(next, this.defaults);
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(validated, null, 2), "utf8");
  }

  public getPath(): string {
    return this.configPath;
  }
}
