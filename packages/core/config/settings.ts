import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage, isMissingFile } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("settings");

export const settingsSchema = z.object({
  auto_start: z.boolean(),
  /** Seconds; used by the web UI only */
  refresh_interval: z.number().positive(),
  /** Number of history entries returned to callers */
  max_history: z.number().int().min(0),
  port: z.number().int().min(1).max(65535),
  enable_history: z.boolean(),
  /** Seconds between clipboard polls */
  monitor_interval: z.number().positive(),
});

export type Settings = z.infer<typeof settingsSchema>;

export const settingsPatchSchema = settingsSchema.partial().strict();

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  auto_start: true,
  refresh_interval: 3,
  max_history: 20,
  port: 8765,
  enable_history: false,
  monitor_interval: 2,
});

export interface SettingsStore {
  load(): Promise<Settings>;
  save(settings: Settings): Promise<void>;
}

/**
 * Settings kept as pretty-printed JSON. Keys missing from the file take their
 * default; a broken file falls back to defaults entirely.
 */
export class JsonFileSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Settings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (!isMissingFile(err)) {
        log.error("Failed to load settings:", errorMessage(err));
      }
      return { ...DEFAULT_SETTINGS };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.error("Failed to load settings:", errorMessage(err));
      return { ...DEFAULT_SETTINGS };
    }

    const merged = settingsSchema.safeParse(
      parsed && typeof parsed === "object" ? { ...DEFAULT_SETTINGS, ...parsed } : parsed
    );
    if (!merged.success) {
      log.error("Invalid settings file, using defaults:", merged.error.issues.map((i) => i.message).join("; "));
      return { ...DEFAULT_SETTINGS };
    }
    return merged.data;
  }

  async save(settings: Settings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(settings, null, 2), "utf8");
  }
}

export function applyPatch(current: Settings, patch: SettingsPatch): Settings {
  return settingsSchema.parse({ ...current, ...patch });
}
