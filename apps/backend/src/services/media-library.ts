/**
 * Media Library
 *
 * Indexes produced media (timelapse frames, recordings, photos) in the
 * captures table by listening to camera manager events.
 */

import { EventEmitter } from "events";
import { nanoid } from "nanoid";
import { desc, eq } from "drizzle-orm";
import { APP_CONFIG } from "@camstation/config";
import { createLogger } from "@camstation/utils";
import type { CaptureKind, CaptureRecord, PaginationParams } from "@camstation/types";
import type { AppDatabase } from "../db";
import { captures, type NewCapture } from "../db/schema";
import type { TimelapseCapturedEvent } from "../camera/timelapse-sampler";
import type { RecordingStoppedEvent } from "../camera/video-recorder";

const logger = createLogger("media-library");

export interface CaptureListOptions extends PaginationParams {
  kind?: CaptureKind;
}

export interface PhotoCapturedEvent {
  filePath: string;
  width: number;
  height: number;
  size: number;
  devicePath: string;
}

export class MediaLibrary {
  private activeDevice: string | null = null;

  constructor(private readonly db: AppDatabase) {}

  /**
   * Record captures announced by the given camera manager
   */
  attach(manager: EventEmitter): () => void {
    const onOpened = (event: { devicePath: string }): void => {
      this.activeDevice = event.devicePath;
    };
    const onFrame = (event: TimelapseCapturedEvent): void => {
      this.record({
        kind: "timelapse",
        filePath: event.filePath,
        width: event.width,
        height: event.height,
        fileSize: event.size,
      });
    };
    const onRecording = (event: RecordingStoppedEvent): void => {
      this.record({
        kind: "recording",
        filePath: event.outputPath,
        width: event.width,
        height: event.height,
      });
    };
    const onPhoto = (event: PhotoCapturedEvent): void => {
      this.record({
        kind: "photo",
        filePath: event.filePath,
        devicePath: event.devicePath,
        width: event.width,
        height: event.height,
        fileSize: event.size,
      });
    };

    manager.on("session:opened", onOpened);
    manager.on("timelapse:captured", onFrame);
    manager.on("recording:stopped", onRecording);
    manager.on("capture:photo", onPhoto);

    return () => {
      manager.off("session:opened", onOpened);
      manager.off("timelapse:captured", onFrame);
      manager.off("recording:stopped", onRecording);
      manager.off("capture:photo", onPhoto);
    };
  }

  record(entry: Omit<NewCapture, "id" | "createdAt">): CaptureRecord | null {
    const row = {
      id: nanoid(),
      devicePath: this.activeDevice,
      ...entry,
      createdAt: new Date(),
    };
    try {
      this.db.insert(captures).values(row).run();
    } catch (error) {
      logger.error("MediaLibrary: Failed to index capture", {
        filePath: entry.filePath,
        error,
      });
      return null;
    }
    return toRecord(row);
  }

  list(options: CaptureListOptions = {}): CaptureRecord[] {
    const limit = Math.min(
      Math.max(options.limit ?? APP_CONFIG.DEFAULT_PAGE_SIZE, 1),
      APP_CONFIG.MAX_PAGE_SIZE,
    );
    const page = Math.max(options.page ?? 1, 1);

    return this.db
      .select()
      .from(captures)
      .where(options.kind ? eq(captures.kind, options.kind) : undefined)
      .orderBy(desc(captures.createdAt))
      .limit(limit)
      .offset((page - 1) * limit)
      .all()
      .map(toRecord);
  }
}

function toRecord(row: {
  id: string;
  kind: CaptureKind;
  filePath: string;
  devicePath?: string | null;
  width?: number | null;
  height?: number | null;
  fileSize?: number | null;
  createdAt: Date;
}): CaptureRecord {
  return {
    id: row.id,
    kind: row.kind,
    filePath: row.filePath,
    devicePath: row.devicePath ?? null,
    width: row.width ?? null,
    height: row.height ?? null,
    fileSize: row.fileSize ?? null,
    createdAt: row.createdAt,
  };
}
