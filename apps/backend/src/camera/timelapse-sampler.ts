/**
 * Timelapse Sampler
 *
 * idle -> running -> idle. While running, writes one JPEG per elapsed
 * interval from its own subscription. The first image is written right
 * away; ticks missed while a write was slow are skipped, not caught up.
 * Stopping restores the resolution and control values that were active
 * when the timelapse started.
 */

import { EventEmitter } from "events";
import fs from "fs/promises";
import path from "path";
import { CAMERA_DEFAULTS } from "@camstation/config";
import type {
  CaptureFormat,
  ControlValues,
  TimelapseOverride,
  TimelapseStatus,
} from "@camstation/types";
import { formatFileSize, formatSequenceFileName } from "@camstation/utils";
import { cameraLogger } from "./logger";
import { toError } from "./errors";
import type { DeviceSession } from "./device-session";
import type { FrameSubscription } from "./frame-hub";
import type { Frame, FrameEncoder, SessionConsumer } from "./types";

export interface TimelapseSamplerOptions {
  encoder: FrameEncoder;
  outputDir: string;
  quality?: number;
  receiveTimeoutMs?: number;
}

export interface TimelapseStartOptions {
  intervalSeconds: number;
  outputDir?: string;
  override?: TimelapseOverride | null;
}

export interface TimelapseCapturedEvent {
  filePath: string;
  index: number;
  sequence: number;
  width: number;
  height: number;
  size: number;
}

interface SettingsSnapshot {
  resolution: CaptureFormat | null;
  controls: ControlValues;
}

export class TimelapseSampler extends EventEmitter implements SessionConsumer {
  readonly name = "timelapse";

  private readonly encoder: FrameEncoder;
  private readonly quality: number;
  private readonly receiveTimeoutMs: number;

  private outputDir: string;
  private running = false;
  private transition: Promise<unknown> | null = null;
  private subscription: FrameSubscription | null = null;
  private unregister: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private snapshot: SettingsSnapshot | null = null;
  private intervalSeconds: number | null = null;
  /** Belongs to the sampler, so stop/start never reuses a file name */
  private nextIndex = 0;
  private framesWritten = 0;
  private lastFramePath: string | null = null;

  constructor(
    private readonly session: DeviceSession,
    options: TimelapseSamplerOptions,
  ) {
    super();
    this.encoder = options.encoder;
    this.outputDir = options.outputDir;
    this.quality = options.quality ?? CAMERA_DEFAULTS.STILL_JPEG_QUALITY;
    this.receiveTimeoutMs =
      options.receiveTimeoutMs ?? CAMERA_DEFAULTS.CONSUMER_RECEIVE_TIMEOUT_MS;
  }

  /**
   * Start sampling. No-op while already running.
   */
  async start(options: TimelapseStartOptions): Promise<TimelapseStatus> {
    if (!(options.intervalSeconds > 0)) {
      throw new RangeError("Timelapse interval must be greater than zero");
    }
    await this.transition;
    if (this.running) {
      return this.getStatus();
    }

    const starting = this.performStart(options);
    this.transition = starting;
    try {
      await starting;
    } finally {
      this.transition = null;
    }
    return this.getStatus();
  }

  /**
   * Stop sampling and restore the snapshotted settings. No-op while idle.
   */
  async stop(): Promise<TimelapseStatus> {
    await this.transition;
    if (!this.running) {
      return this.getStatus();
    }

    const stopping = this.performStop();
    this.transition = stopping;
    try {
      await stopping;
    } finally {
      this.transition = null;
    }
    return this.getStatus();
  }

  isRunning(): boolean {
    return this.running;
  }

  setOutputDir(outputDir: string): void {
    this.outputDir = outputDir;
  }

  getStatus(): TimelapseStatus {
    return {
      running: this.running,
      intervalSeconds: this.intervalSeconds,
      outputDir: this.outputDir,
      framesWritten: this.framesWritten,
      nextIndex: this.nextIndex,
      lastFramePath: this.lastFramePath,
    };
  }

  private async performStart(options: TimelapseStartOptions): Promise<void> {
    const outputDir = options.outputDir ?? this.outputDir;
    await fs.mkdir(outputDir, { recursive: true });
    this.outputDir = outputDir;

    this.snapshot = {
      resolution: this.session.getCurrentResolution(),
      controls: this.session.getAllCurrentValues(),
    };

    const override = options.override;
    if (override) {
      await this.applyOverride(override);
    }

    const subscription = this.session.hub.attach("timelapse");
    this.subscription = subscription;
    this.unregister = this.session.registerConsumer(this);
    this.intervalSeconds = options.intervalSeconds;
    this.running = true;
    this.loop = this.run(subscription, options.intervalSeconds * 1000, outputDir);

    cameraLogger.info("TimelapseSampler: Started", {
      intervalSeconds: options.intervalSeconds,
      outputDir,
      override: override ?? undefined,
    });
    this.emit("timelapse:started", this.getStatus());
  }

  private async performStop(): Promise<void> {
    this.running = false;
    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      this.session.hub.detach(subscription);
    }
    await this.loop;
    this.loop = null;
    this.unregister?.();
    this.unregister = null;

    const snapshot = this.snapshot;
    this.snapshot = null;
    if (snapshot) {
      await this.restore(snapshot);
    }

    cameraLogger.info("TimelapseSampler: Stopped", {
      framesWritten: this.framesWritten,
      nextIndex: this.nextIndex,
    });
    this.emit("timelapse:stopped", this.getStatus());
  }

  private async applyOverride(override: TimelapseOverride): Promise<void> {
    if (override.resolution) {
      const { width, height, format } = override.resolution;
      const result = await this.session.setResolution(width, height, format);
      if (!result.success) {
        cameraLogger.warn(`TimelapseSampler: Override resolution not applied: ${result.message}`);
      }
    }
    for (const [name, value] of Object.entries(override.controls ?? {})) {
      const result = await this.session.setControlValue(name, value);
      if (!result.success) {
        cameraLogger.warn(`TimelapseSampler: Override control not applied: ${result.message}`);
      }
    }
  }

  private async restore(snapshot: SettingsSnapshot): Promise<void> {
    const previous = snapshot.resolution;
    const current = this.session.getCurrentResolution();
    if (
      previous &&
      (!current ||
        current.width !== previous.width ||
        current.height !== previous.height ||
        current.format !== previous.format)
    ) {
      const result = await this.session.setResolution(
        previous.width,
        previous.height,
        previous.format,
      );
      if (!result.success) {
        cameraLogger.warn(`TimelapseSampler: Failed to restore resolution: ${result.message}`);
      }
    }

    const values = this.session.getAllCurrentValues();
    for (const [name, value] of Object.entries(snapshot.controls)) {
      if (values[name] === value) continue;
      const result = await this.session.setControlValue(name, value);
      if (!result.success) {
        cameraLogger.warn(`TimelapseSampler: Failed to restore ${name}: ${result.message}`);
      }
    }
  }

  private async run(
    subscription: FrameSubscription,
    intervalMs: number,
    outputDir: string,
  ): Promise<void> {
    let deadline: number | null = null;

    while (this.running) {
      const frame = await subscription.receive(this.receiveTimeoutMs);
      if (!frame) {
        if (subscription.isClosed()) break;
        continue;
      }

      if (deadline !== null && frame.timestamp < deadline) {
        continue;
      }

      await this.writeFrame(frame, outputDir);

      deadline = (deadline ?? frame.timestamp) + intervalMs;
      while (deadline <= frame.timestamp) {
        deadline += intervalMs;
      }
    }
  }

  private async writeFrame(frame: Frame, outputDir: string): Promise<void> {
    const index = this.nextIndex;
    const filePath = path.join(outputDir, formatSequenceFileName("frame", index, "jpg"));

    try {
      const data = await this.encoder.toJpeg(frame, this.quality);
      await fs.writeFile(filePath, data);
      this.nextIndex += 1;
      this.framesWritten += 1;
      this.lastFramePath = filePath;
      cameraLogger.info(`TimelapseSampler: Captured ${filePath} (${formatFileSize(data.length)})`);

      const event: TimelapseCapturedEvent = {
        filePath,
        index,
        sequence: frame.sequence,
        width: frame.width,
        height: frame.height,
        size: data.length,
      };
      this.emit("timelapse:captured", event);
    } catch (error) {
      cameraLogger.warn("TimelapseSampler: Failed to write frame", {
        filePath,
        error: toError(error).message,
      });
    }
  }
}
