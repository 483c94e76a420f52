/**
 * Camera Manager
 *
 * Owns the active device session and the consumers attached to it. Exactly
 * one camera is active at a time; switching fully closes the old session
 * before the new device is opened.
 *
 * Re-emits session, timelapse and recording events, plus capture:photo.
 */

import { EventEmitter } from "events";
import fs from "fs/promises";
import path from "path";
import { CAMERA_DEFAULTS } from "@camstation/config";
import type {
  CameraDevice,
  CameraEventType,
  CameraStatusResponse,
  CapturePhotoResponse,
  CaptureSettings,
  RecordingStartRequest,
  RecordingStatus,
  TimelapseStartRequest,
  TimelapseStatus,
} from "@camstation/types";
import { cameraLogger } from "./logger";
import { CameraNotInitializedError, CaptureTimeoutError, toError } from "./errors";
import { DeviceSession, type DeviceSessionOptions } from "./device-session";
import { PreviewEncoder } from "./preview-encoder";
import { TimelapseSampler } from "./timelapse-sampler";
import { VideoRecorder } from "./video-recorder";
import type { DeviceBackend, FrameEncoder, VideoWriterFactory } from "./types";

export interface CaptureOutputDirs {
  timelapse: string;
  videos: string;
  photos: string;
}

/** Read side of the persisted capture settings */
export interface CaptureSettingsSource {
  get(): CaptureSettings;
}

export type SessionTuning = Pick<
  DeviceSessionOptions,
  "fps" | "readTimeoutMs" | "readFailureThreshold" | "reopenSettleMs" | "startProducer"
>;

export interface CameraManagerOptions {
  backend: DeviceBackend;
  encoder: FrameEncoder;
  writerFactory: VideoWriterFactory;
  outputDirs: CaptureOutputDirs;
  /** Device opened by initialize() when none is given */
  defaultDevice?: string;
  session?: SessionTuning;
  previewQuality?: number;
  settings?: CaptureSettingsSource;
  photoTimeoutMs?: number;
  /** Passed to every consumer; tests shorten it */
  receiveTimeoutMs?: number;
}

export interface ActiveCamera {
  session: DeviceSession;
  preview: PreviewEncoder;
  timelapse: TimelapseSampler;
  recorder: VideoRecorder;
}

export interface CameraManagerHealth {
  status: "healthy" | "failed" | "disconnected";
  photosCaptured: number;
  photoFailures: number;
  lastCaptureAt: string | null;
  lastError: string | null;
}

const SESSION_EVENTS: CameraEventType[] = [
  "session:reinitialized",
  "session:failed",
  "session:closed",
];
const TIMELAPSE_EVENTS: CameraEventType[] = [
  "timelapse:started",
  "timelapse:captured",
  "timelapse:stopped",
];
const RECORDING_EVENTS: CameraEventType[] = ["recording:started", "recording:stopped"];

export class CameraManager extends EventEmitter {
  private readonly backend: DeviceBackend;
  private readonly encoder: FrameEncoder;
  private readonly writerFactory: VideoWriterFactory;
  private readonly defaultDevice: string | undefined;
  private readonly tuning: SessionTuning;
  private readonly previewQuality: number;
  private readonly settings: CaptureSettingsSource | undefined;
  private readonly photoTimeoutMs: number;
  private readonly receiveTimeoutMs: number | undefined;

  private outputDirs: CaptureOutputDirs;
  private active: ActiveCamera | null = null;
  private lifecycle: Promise<unknown> = Promise.resolve();

  private health: CameraManagerHealth = {
    status: "disconnected",
    photosCaptured: 0,
    photoFailures: 0,
    lastCaptureAt: null,
    lastError: null,
  };

  constructor(options: CameraManagerOptions) {
    super();
    this.backend = options.backend;
    this.encoder = options.encoder;
    this.writerFactory = options.writerFactory;
    this.outputDirs = { ...options.outputDirs };
    this.defaultDevice = options.defaultDevice;
    this.tuning = options.session ?? {};
    this.previewQuality = options.previewQuality ?? CAMERA_DEFAULTS.PREVIEW_JPEG_QUALITY;
    this.settings = options.settings;
    this.photoTimeoutMs = options.photoTimeoutMs ?? CAMERA_DEFAULTS.PHOTO_CAPTURE_TIMEOUT_MS;
    this.receiveTimeoutMs = options.receiveTimeoutMs;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async discoverCameras(): Promise<CameraDevice[]> {
    return this.backend.listDevices();
  }

  /**
   * Open the given device, the configured one, or the first discovered one.
   * Resolves with the opened device path, or null when there is no camera.
   */
  initialize(devicePath?: string): Promise<string | null> {
    return this.serialize(async () => {
      if (this.active) {
        return this.active.session.devicePath;
      }

      let target = devicePath ?? this.defaultDevice;
      if (!target) {
        const devices = await this.discoverCameras();
        target = devices[0]?.path;
      }
      if (!target) {
        cameraLogger.warn("CameraManager: No cameras found");
        return null;
      }

      await this.openCamera(target);
      return target;
    });
  }

  /**
   * Close the active session, then open the given device. When the open
   * fails no camera is active afterwards.
   */
  switchCamera(devicePath: string): Promise<void> {
    return this.serialize(async () => {
      if (this.active?.session.devicePath === devicePath) {
        return;
      }
      cameraLogger.info(`CameraManager: Switching camera to ${devicePath}`);
      await this.closeActive();
      await this.openCamera(devicePath);
    });
  }

  shutdown(): Promise<void> {
    return this.serialize(() => this.closeActive());
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getActive(): ActiveCamera | null {
    return this.active;
  }

  /**
   * Active camera, or CameraNotInitializedError
   */
  requireActive(operation: string): ActiveCamera {
    if (!this.active) {
      throw new CameraNotInitializedError(operation);
    }
    return this.active;
  }

  isConnected(): boolean {
    return this.active !== null && this.active.session.isStreaming();
  }

  getHealth(): CameraManagerHealth {
    return { ...this.health };
  }

  getOutputDirs(): CaptureOutputDirs {
    return { ...this.outputDirs };
  }

  setOutputDirs(dirs: Partial<CaptureOutputDirs>): void {
    this.outputDirs = { ...this.outputDirs, ...dirs };
    if (this.active) {
      this.active.timelapse.setOutputDir(this.outputDirs.timelapse);
      this.active.recorder.setOutputDir(this.outputDirs.videos);
    }
    cameraLogger.info("CameraManager: Output directories updated", this.outputDirs);
  }

  getStatus(): CameraStatusResponse {
    const active = this.active;
    if (!active) {
      return {
        connected: false,
        devicePath: null,
        state: "closed",
        resolution: null,
        supportedFormats: [],
        consecutiveReadFailures: 0,
        framesRead: 0,
        previewAvailable: false,
        timelapse: this.idleTimelapseStatus(),
        recording: this.idleRecordingStatus(),
      };
    }

    const status = active.session.getStatus();
    return {
      connected: active.session.isStreaming(),
      devicePath: status.devicePath,
      state: status.state,
      resolution: status.resolution,
      supportedFormats: status.supportedFormats,
      consecutiveReadFailures: status.consecutiveReadFailures,
      framesRead: status.framesRead,
      previewAvailable: active.preview.getCurrentFrame() !== null,
      timelapse: active.timelapse.getStatus(),
      recording: active.recorder.getStatus(),
    };
  }

  // ==========================================================================
  // Capture
  // ==========================================================================

  /**
   * Write the next frame as a JPEG still. Without a path the photo goes to
   * the photo directory as photo_<epoch ms>.jpg.
   */
  async capturePhoto(filePath?: string): Promise<CapturePhotoResponse> {
    const { session } = this.requireActive("capture_photo");
    const target = filePath ?? path.join(this.outputDirs.photos, `photo_${Date.now()}.jpg`);
    const subscription = session.hub.attach("capture");

    try {
      const frame = await subscription.receive(this.photoTimeoutMs);
      if (!frame) {
        throw new CaptureTimeoutError(this.photoTimeoutMs, {
          devicePath: session.devicePath,
        });
      }

      const data = await this.encoder.toJpeg(frame, CAMERA_DEFAULTS.STILL_JPEG_QUALITY);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data);

      const result: CapturePhotoResponse = {
        filePath: target,
        width: frame.width,
        height: frame.height,
        size: data.length,
      };
      this.health.photosCaptured += 1;
      this.health.lastCaptureAt = new Date().toISOString();
      cameraLogger.info(`CameraManager: Photo captured ${target}`);
      this.emit("capture:photo", { ...result, devicePath: session.devicePath });
      return result;
    } catch (error) {
      this.health.photoFailures += 1;
      this.health.lastError = toError(error).message;
      cameraLogger.error("CameraManager: Photo capture failed", {
        filePath: target,
        error: toError(error).message,
      });
      throw error;
    } finally {
      session.hub.detach(subscription);
    }
  }

  /**
   * Start the timelapse. Interval and override fall back to the persisted
   * capture settings.
   */
  startTimelapse(request: TimelapseStartRequest = {}): Promise<TimelapseStatus> {
    const { timelapse } = this.requireActive("timelapse_start");
    const settings = this.settings?.get();
    return timelapse.start({
      intervalSeconds:
        request.intervalSeconds ??
        settings?.timelapseIntervalSeconds ??
        CAMERA_DEFAULTS.TIMELAPSE_INTERVAL_SECONDS,
      outputDir: request.outputDir,
      override: request.override ?? settings?.timelapseOverride ?? null,
    });
  }

  async stopTimelapse(): Promise<TimelapseStatus> {
    if (!this.active) {
      return this.idleTimelapseStatus();
    }
    return this.active.timelapse.stop();
  }

  startRecording(request: RecordingStartRequest = {}): Promise<string> {
    const { recorder } = this.requireActive("recording_start");
    return recorder.start({ filename: request.filename, fps: request.fps });
  }

  async stopRecording(): Promise<string | null> {
    if (!this.active) {
      return null;
    }
    return this.active.recorder.stop();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lifecycle.then(task, task);
    this.lifecycle = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async openCamera(devicePath: string): Promise<void> {
    let session: DeviceSession;
    try {
      session = await DeviceSession.open({
        devicePath,
        backend: this.backend,
        ...this.tuning,
      });
    } catch (error) {
      this.health.status = "disconnected";
      this.health.lastError = toError(error).message;
      cameraLogger.error(`CameraManager: Failed to open ${devicePath}`, {
        error: toError(error).message,
      });
      throw error;
    }

    const preview = new PreviewEncoder(session, {
      encoder: this.encoder,
      quality: this.previewQuality,
      receiveTimeoutMs: this.receiveTimeoutMs,
    });
    const timelapse = new TimelapseSampler(session, {
      encoder: this.encoder,
      outputDir: this.outputDirs.timelapse,
      receiveTimeoutMs: this.receiveTimeoutMs,
    });
    const recorder = new VideoRecorder(session, {
      outputDir: this.outputDirs.videos,
      writerFactory: this.writerFactory,
      receiveTimeoutMs: this.receiveTimeoutMs,
    });

    this.forward(session, SESSION_EVENTS);
    this.forward(timelapse, TIMELAPSE_EVENTS);
    this.forward(recorder, RECORDING_EVENTS);
    session.on("session:failed", (payload: { error?: string }) => {
      this.health.status = "failed";
      this.health.lastError = payload.error ?? "Reinitialization failed";
    });
    session.on("session:reinitialized", () => {
      this.health.status = "healthy";
    });

    preview.start();
    this.active = { session, preview, timelapse, recorder };
    this.health.status = "healthy";

    cameraLogger.info(`CameraManager: Camera ${devicePath} active`, {
      resolution: session.getCurrentResolution(),
    });
    this.emit("session:opened", {
      devicePath,
      resolution: session.getCurrentResolution(),
    });
  }

  private async closeActive(): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    this.active = null;
    // Stops preview, timelapse and recorder through the session's consumers
    await active.session.close();
    this.health.status = "disconnected";
  }

  private forward(source: EventEmitter, events: CameraEventType[]): void {
    for (const event of events) {
      source.on(event, (payload: unknown) => this.emit(event, payload));
    }
  }

  private idleTimelapseStatus(): TimelapseStatus {
    return {
      running: false,
      intervalSeconds: null,
      outputDir: this.outputDirs.timelapse,
      framesWritten: 0,
      nextIndex: 0,
      lastFramePath: null,
    };
  }

  private idleRecordingStatus(): RecordingStatus {
    return {
      recording: false,
      outputPath: null,
      framesWritten: 0,
      framesSkipped: 0,
      writeFailures: 0,
      startedAt: null,
    };
  }
}
