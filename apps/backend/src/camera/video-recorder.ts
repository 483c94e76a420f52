/**
 * Video Recorder
 *
 * idle -> recording -> idle. Consumes every frame from its own bounded
 * subscription and hands it to a video writer. The resolution is held for
 * the whole recording so the writer's frame size stays valid.
 */

import { EventEmitter } from "events";
import fs from "fs/promises";
import path from "path";
import { CAMERA_DEFAULTS } from "@camstation/config";
import type { RecordingStatus } from "@camstation/types";
import { formatFileTimestamp, sanitizeFileName, sleep } from "@camstation/utils";
import { cameraLogger } from "./logger";
import { CameraNotInitializedError, WriterOpenFailedError, toError } from "./errors";
import type { DeviceSession } from "./device-session";
import type { FrameSubscription } from "./frame-hub";
import { frameEncodingFor } from "./formats";
import type {
  Frame,
  SessionConsumer,
  VideoWriter,
  VideoWriterFactory,
} from "./types";

export interface VideoRecorderOptions {
  outputDir: string;
  writerFactory: VideoWriterFactory;
  receiveTimeoutMs?: number;
  writeBackoffMs?: number;
}

export interface RecordingStartOptions {
  filename?: string;
  fps?: number;
}

export interface RecordingStoppedEvent {
  outputPath: string;
  framesWritten: number;
  framesSkipped: number;
  writeFailures: number;
  width: number;
  height: number;
}

export class VideoRecorder extends EventEmitter implements SessionConsumer {
  readonly name = "recorder";

  private readonly writerFactory: VideoWriterFactory;
  private readonly receiveTimeoutMs: number;
  private readonly writeBackoffMs: number;

  private outputDir: string;
  private recording = false;
  private transition: Promise<unknown> | null = null;
  private writer: VideoWriter | null = null;
  private subscription: FrameSubscription | null = null;
  private releaseHold: (() => void) | null = null;
  private unregister: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private outputPath: string | null = null;
  private startedAt: Date | null = null;
  private framesWritten = 0;
  private framesSkipped = 0;
  private writeFailures = 0;

  constructor(
    private readonly session: DeviceSession,
    options: VideoRecorderOptions,
  ) {
    super();
    this.outputDir = options.outputDir;
    this.writerFactory = options.writerFactory;
    this.receiveTimeoutMs =
      options.receiveTimeoutMs ?? CAMERA_DEFAULTS.CONSUMER_RECEIVE_TIMEOUT_MS;
    this.writeBackoffMs = options.writeBackoffMs ?? CAMERA_DEFAULTS.RECORDER_WRITE_BACKOFF_MS;
  }

  /**
   * Start recording and return the output path. While already recording,
   * returns the active path.
   */
  async start(options: RecordingStartOptions = {}): Promise<string> {
    await this.transition;
    if (this.recording && this.outputPath) {
      return this.outputPath;
    }

    const starting = this.performStart(options);
    this.transition = starting;
    try {
      return await starting;
    } finally {
      this.transition = null;
    }
  }

  /**
   * Stop recording, flushing queued frames. Returns the output path, or
   * null when not recording.
   */
  async stop(): Promise<string | null> {
    await this.transition;
    if (!this.recording) {
      return null;
    }

    const stopping = this.performStop();
    this.transition = stopping;
    try {
      return await stopping;
    } finally {
      this.transition = null;
    }
  }

  isRecording(): boolean {
    return this.recording;
  }

  setOutputDir(outputDir: string): void {
    this.outputDir = outputDir;
  }

  getStatus(): RecordingStatus {
    return {
      recording: this.recording,
      outputPath: this.outputPath,
      framesWritten: this.framesWritten,
      framesSkipped: this.framesSkipped,
      writeFailures: this.writeFailures,
      startedAt: this.startedAt ? this.startedAt.toISOString() : null,
    };
  }

  private resolveOutputPath(filename: string | undefined): string {
    if (!filename) {
      return path.join(this.outputDir, `record_${formatFileTimestamp()}.avi`);
    }
    if (path.isAbsolute(filename)) {
      return filename;
    }
    return path.join(this.outputDir, sanitizeFileName(filename));
  }

  private async performStart(options: RecordingStartOptions): Promise<string> {
    const resolution = this.session.getCurrentResolution();
    if (!resolution || !this.session.isStreaming()) {
      throw new CameraNotInitializedError("recording_start");
    }

    const outputPath = this.resolveOutputPath(options.filename);
    const fps = options.fps ?? CAMERA_DEFAULTS.FPS;
    const releaseHold = this.session.holdResolution("recording");

    let writer: VideoWriter;
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      writer = await this.writerFactory({
        outputPath,
        width: resolution.width,
        height: resolution.height,
        fps,
        encoding: frameEncodingFor(resolution.format),
      });
    } catch (error) {
      releaseHold();
      const failure = new WriterOpenFailedError(outputPath, toError(error).message, {
        devicePath: this.session.devicePath,
      });
      cameraLogger.error(`VideoRecorder: ${failure.message}`);
      throw failure;
    }

    this.writer = writer;
    this.releaseHold = releaseHold;
    this.outputPath = outputPath;
    this.startedAt = new Date();
    this.framesWritten = 0;
    this.framesSkipped = 0;
    this.writeFailures = 0;

    const subscription = this.session.hub.attach("recorder");
    this.subscription = subscription;
    this.unregister = this.session.registerConsumer(this);
    this.recording = true;
    this.loop = this.run(subscription, writer);

    cameraLogger.info("VideoRecorder: Recording started", {
      outputPath,
      fps,
      width: resolution.width,
      height: resolution.height,
    });
    this.emit("recording:started", this.getStatus());
    return outputPath;
  }

  private async performStop(): Promise<string | null> {
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      // Closing keeps queued frames receivable, so the loop flushes them
      this.session.hub.detach(subscription);
    }
    await this.loop;
    this.loop = null;

    const writer = this.writer;
    this.writer = null;
    if (writer) {
      try {
        await writer.close();
      } catch (error) {
        cameraLogger.error("VideoRecorder: Failed to close writer", {
          outputPath: this.outputPath,
          error: toError(error).message,
        });
      }
    }

    this.releaseHold?.();
    this.releaseHold = null;
    this.unregister?.();
    this.unregister = null;
    this.recording = false;

    const outputPath = this.outputPath;
    cameraLogger.info("VideoRecorder: Recording stopped", {
      outputPath,
      framesWritten: this.framesWritten,
      framesSkipped: this.framesSkipped,
      writeFailures: this.writeFailures,
    });
    if (outputPath && writer) {
      const event: RecordingStoppedEvent = {
        outputPath,
        framesWritten: this.framesWritten,
        framesSkipped: this.framesSkipped,
        writeFailures: this.writeFailures,
        width: writer.width,
        height: writer.height,
      };
      this.emit("recording:stopped", event);
    }
    return outputPath;
  }

  private async run(subscription: FrameSubscription, writer: VideoWriter): Promise<void> {
    for (;;) {
      const frame = await subscription.receive(this.receiveTimeoutMs);
      if (!frame) {
        if (subscription.isClosed()) break;
        continue;
      }
      await this.writeFrame(writer, frame);
    }
  }

  private async writeFrame(writer: VideoWriter, frame: Frame): Promise<void> {
    if (frame.width !== writer.width || frame.height !== writer.height) {
      this.framesSkipped += 1;
      cameraLogger.debug("VideoRecorder: Skipping frame with mismatched size", {
        sequence: frame.sequence,
        frame: `${frame.width}x${frame.height}`,
        writer: `${writer.width}x${writer.height}`,
      });
      return;
    }

    try {
      await writer.write(frame);
      this.framesWritten += 1;
    } catch (error) {
      this.writeFailures += 1;
      cameraLogger.warn("VideoRecorder: Frame write failed", {
        sequence: frame.sequence,
        failures: this.writeFailures,
        error: toError(error).message,
      });
      await sleep(this.writeBackoffMs);
    }
  }
}
