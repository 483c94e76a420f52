/**
 * Settings Store
 *
 * Persists the capture settings (output directories, timelapse interval and
 * override) as JSON values in the settings table. Keeps working from memory
 * when no database is available.
 */

import { createLogger } from "@camstation/utils";
import type {
  CaptureFormat,
  CaptureSettings,
  ControlValues,
  TimelapseOverride,
} from "@camstation/types";
import type { AppDatabase } from "../db";
import { settings } from "../db/schema";
import type { CaptureSettingsSource } from "../camera/camera-manager";

const logger = createLogger("settings-store");

const KEYS = {
  imageOutputDir: "image_output_dir",
  videoOutputDir: "video_output_dir",
  timelapseIntervalSeconds: "timelapse_interval_seconds",
  timelapseOverride: "timelapse_override",
} as const satisfies Record<keyof CaptureSettings, string>;

const FIELDS: Array<keyof CaptureSettings> = [
  "imageOutputDir",
  "videoOutputDir",
  "timelapseIntervalSeconds",
  "timelapseOverride",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseCaptureFormat(value: unknown): CaptureFormat | null {
  if (!isRecord(value)) return null;
  const { format, width, height } = value;
  if (
    typeof format !== "string" ||
    typeof width !== "number" ||
    typeof height !== "number" ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    return null;
  }
  return { format, width, height };
}

function parseControlValues(value: unknown): ControlValues | null {
  if (!isRecord(value)) return null;
  const controls: ControlValues = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      return null;
    }
    controls[name] = entry;
  }
  return controls;
}

/**
 * Narrow an untrusted value to a timelapse override. Returns null when the
 * value is not an object or any part of it is malformed.
 */
export function parseTimelapseOverride(value: unknown): TimelapseOverride | null {
  if (!isRecord(value)) return null;

  const override: TimelapseOverride = {};
  if (value.resolution !== undefined) {
    const resolution = parseCaptureFormat(value.resolution);
    if (!resolution) return null;
    override.resolution = resolution;
  }
  if (value.controls !== undefined) {
    const controls = parseControlValues(value.controls);
    if (!controls) return null;
    override.controls = controls;
  }
  return override;
}

export class SettingsStore implements CaptureSettingsSource {
  private current: CaptureSettings;

  constructor(
    private readonly db: AppDatabase | null,
    defaults: CaptureSettings,
  ) {
    this.current = { ...defaults };
    if (db) {
      this.load();
    } else {
      logger.warn("SettingsStore: No database, settings are kept in memory only");
    }
  }

  get(): CaptureSettings {
    return { ...this.current };
  }

  /**
   * Merge and persist an update. Returns the resulting settings.
   */
  save(update: Partial<CaptureSettings>): CaptureSettings {
    const next: CaptureSettings = { ...this.current };
    if (update.imageOutputDir !== undefined) next.imageOutputDir = update.imageOutputDir;
    if (update.videoOutputDir !== undefined) next.videoOutputDir = update.videoOutputDir;
    if (update.timelapseIntervalSeconds !== undefined) {
      next.timelapseIntervalSeconds = update.timelapseIntervalSeconds;
    }
    if (update.timelapseOverride !== undefined) {
      next.timelapseOverride = update.timelapseOverride;
    }

    if (this.db) {
      const db = this.db;
      const now = new Date();
      db.transaction((tx) => {
        for (const field of FIELDS) {
          const value = JSON.stringify(next[field]);
          tx.insert(settings)
            .values({ key: KEYS[field], value, updatedAt: now })
            .onConflictDoUpdate({ target: settings.key, set: { value, updatedAt: now } })
            .run();
        }
      });
    }

    this.current = next;
    logger.info("SettingsStore: Settings saved", next);
    return this.get();
  }

  private load(): void {
    if (!this.db) return;
    const rows = this.db.select().from(settings).all();
    const stored = new Map<string, unknown>();
    for (const row of rows) {
      try {
        stored.set(row.key, JSON.parse(row.value));
      } catch (error) {
        logger.warn(`SettingsStore: Ignoring unreadable setting ${row.key}`, { error });
      }
    }

    const imageOutputDir = stored.get(KEYS.imageOutputDir);
    if (typeof imageOutputDir === "string" && imageOutputDir) {
      this.current.imageOutputDir = imageOutputDir;
    }
    const videoOutputDir = stored.get(KEYS.videoOutputDir);
    if (typeof videoOutputDir === "string" && videoOutputDir) {
      this.current.videoOutputDir = videoOutputDir;
    }
    const interval = stored.get(KEYS.timelapseIntervalSeconds);
    if (typeof interval === "number" && interval > 0) {
      this.current.timelapseIntervalSeconds = interval;
    }
    if (stored.has(KEYS.timelapseOverride)) {
      this.current.timelapseOverride = parseTimelapseOverride(
        stored.get(KEYS.timelapseOverride),
      );
    }

    logger.info("SettingsStore: Loaded settings", { keys: rows.length });
  }
}
