/**
 * Device Session
 *
 * Owns the single open handle of one capture device. Every handle access
 * (read, configure, control write, reinitialize, close) runs inside the
 * session's DeviceMutex, so the production loop and administrative calls
 * never touch the device at the same time.
 *
 * Events:
 * - session:reinitialized { devicePath, resolution }
 * - session:failed { devicePath, error }
 * - session:closed { devicePath }
 */

import { EventEmitter } from "events";
import { CAMERA_DEFAULTS } from "@camstation/config";
import type {
  CaptureFormat,
  ControlDescriptor,
  ControlValues,
  OperationResult,
  SessionState,
} from "@camstation/types";
import { sleep } from "@camstation/utils";
import { cameraLogger } from "./logger";
import { DeviceMutex } from "./mutex";
import { ControlRegistry } from "./control-registry";
import { FrameHub } from "./frame-hub";
import { sameFormat, sortFormats } from "./formats";
import {
  CameraNotInitializedError,
  ControlApplyFailedError,
  ControlOutOfRangeError,
  DeviceUnavailableError,
  NoControlsFoundError,
  NoSupportedFormatsError,
  ReinitializationFailedError,
  UnknownControlError,
  toError,
} from "./errors";
import type {
  ControlApplyOutcome,
  DeviceBackend,
  DeviceHandle,
  FrameSource,
  ReadResult,
  SessionConsumer,
} from "./types";

export interface DeviceSessionOptions {
  devicePath: string;
  backend: DeviceBackend;
  hub?: FrameHub;
  /** Frame rate requested when configuring the device */
  fps?: number;
  /** Upper bound for one device read */
  readTimeoutMs?: number;
  /** Consecutive failed reads tolerated before an automatic reinitialize */
  readFailureThreshold?: number;
  /** Pause between releasing and reopening the device */
  reopenSettleMs?: number;
  /** Start the hub's production loop once the device is open */
  startProducer?: boolean;
}

export interface ControlWriteResult extends OperationResult {
  error?: UnknownControlError | ControlOutOfRangeError | ControlApplyFailedError;
}

export interface ResetDefaultsResult extends OperationResult {
  failed: string[];
}

export interface DeviceSessionStatus {
  devicePath: string;
  state: SessionState;
  resolution: CaptureFormat | null;
  supportedFormats: CaptureFormat[];
  consecutiveReadFailures: number;
  framesRead: number;
  reinitializations: number;
  resolutionHolds: string[];
}

export class DeviceSession extends EventEmitter implements FrameSource {
  readonly devicePath: string;
  readonly hub: FrameHub;
  readonly registry: ControlRegistry;

  private readonly backend: DeviceBackend;
  private readonly mutex = new DeviceMutex();
  private readonly fps: number;
  private readonly readTimeoutMs: number;
  private readonly readFailureThreshold: number;
  private readonly reopenSettleMs: number;
  private readonly startProducer: boolean;

  private handle: DeviceHandle | null = null;
  private state: SessionState = "closed";
  private currentFormat: CaptureFormat | null = null;
  private supportedFormats: CaptureFormat[] = [];
  private consecutiveFailures = 0;
  private sequence = 0;
  private framesRead = 0;
  private reinitializations = 0;
  private consumers: SessionConsumer[] = [];
  private resolutionHolds = new Map<symbol, string>();
  private closing: Promise<void> | null = null;

  private constructor(options: DeviceSessionOptions) {
    super();
    this.devicePath = options.devicePath;
    this.backend = options.backend;
    this.hub = options.hub ?? new FrameHub();
    this.fps = options.fps ?? CAMERA_DEFAULTS.FPS;
    this.readTimeoutMs = options.readTimeoutMs ?? CAMERA_DEFAULTS.READ_TIMEOUT_MS;
    this.readFailureThreshold =
      options.readFailureThreshold ?? CAMERA_DEFAULTS.READ_FAILURE_THRESHOLD;
    this.reopenSettleMs = options.reopenSettleMs ?? CAMERA_DEFAULTS.REOPEN_SETTLE_MS;
    this.startProducer = options.startProducer ?? true;

    const devicePath = this.devicePath;
    const backend = this.backend;
    this.registry = new ControlRegistry({
      listControls: () => backend.listControls(devicePath),
      applyControl: (name, value) => backend.applyControl(devicePath, name, value),
    });
  }

  /**
   * Open the device, apply calculated control defaults and the smallest
   * supported format, then start the production loop
   */
  static async open(options: DeviceSessionOptions): Promise<DeviceSession> {
    const session = new DeviceSession(options);
    try {
      await session.mutex.acquire(() => session.initializeDevice(null), {
        operation: "open",
        devicePath: session.devicePath,
      });
    } catch (error) {
      session.state = "closed";
      throw error;
    }

    cameraLogger.info("DeviceSession: Opened", {
      devicePath: session.devicePath,
      resolution: session.currentFormat,
      controls: session.registry.size(),
    });

    if (session.startProducer) {
      session.hub.start(session);
    }
    return session;
  }

  // ==========================================================================
  // Frame production
  // ==========================================================================

  /**
   * Read one frame. Failed reads are counted; exceeding the threshold
   * triggers exactly one reinitialize and resets the counter.
   */
  async readFrame(): Promise<ReadResult> {
    if (this.isTerminal()) {
      return { status: "closed" };
    }

    const result = await this.mutex.acquire(
      async (): Promise<ReadResult> => {
        const handle = this.handle;
        if (this.isTerminal()) {
          return { status: "closed" };
        }
        if (!handle || !handle.isOpen() || this.state !== "streaming") {
          return { status: "failed", error: "Device not streaming" };
        }

        try {
          const raw = await handle.read(this.readTimeoutMs);
          if (!raw || raw.data.length === 0) {
            return { status: "failed", error: "No frame within read timeout" };
          }
          this.sequence += 1;
          return {
            status: "frame",
            frame: { ...raw, sequence: this.sequence, timestamp: Date.now() },
          };
        } catch (error) {
          return { status: "failed", error: toError(error).message };
        }
      },
      { operation: "read", devicePath: this.devicePath },
    );

    if (result.status === "frame") {
      this.consecutiveFailures = 0;
      this.framesRead += 1;
    } else if (result.status === "failed") {
      await this.recordReadFailure(result.error);
    }
    return result;
  }

  private async recordReadFailure(reason: string | undefined): Promise<void> {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures <= this.readFailureThreshold) {
      return;
    }

    cameraLogger.warn(
      `DeviceSession: ${this.consecutiveFailures} consecutive read failures, reinitializing`,
      { devicePath: this.devicePath, reason },
    );
    this.consecutiveFailures = 0;

    try {
      await this.reinitialize();
    } catch (error) {
      cameraLogger.error("DeviceSession: Automatic reinitialization failed", {
        devicePath: this.devicePath,
        error: toError(error).message,
      });
    }
  }

  // ==========================================================================
  // Administrative operations
  // ==========================================================================

  /**
   * Switch to a supported (format, width, height). Rejected while a
   * resolution hold is active. Stale frames are drained on success.
   */
  async setResolution(
    width: number,
    height: number,
    format: string = CAMERA_DEFAULTS.FORMAT,
  ): Promise<OperationResult> {
    const target = this.supportedFormats.find((f) =>
      sameFormat(f, { format, width, height }),
    );
    if (!target) {
      return {
        success: false,
        message: `Unsupported resolution ${width}x${height} (${format})`,
      };
    }

    return this.mutex.acquire(
      async (): Promise<OperationResult> => {
        if (this.resolutionHolds.size > 0) {
          const owners = Array.from(new Set(this.resolutionHolds.values())).join(", ");
          return {
            success: false,
            message: `Resolution is locked while ${owners} is active`,
          };
        }

        const handle = this.handle;
        if (!handle || this.state !== "streaming") {
          return { success: false, message: "Camera is not streaming" };
        }

        const previous = this.currentFormat;
        try {
          await handle.configure({ ...target, fps: this.fps });
          this.currentFormat = { ...target };
          this.hub.drain();
          cameraLogger.info(`DeviceSession: Resolution set to ${width}x${height} (${format})`);
          return {
            success: true,
            message: `Resolution set to ${width}x${height} (${format})`,
          };
        } catch (error) {
          const message = toError(error).message;
          cameraLogger.warn("DeviceSession: Failed to set resolution", {
            target,
            error: message,
          });
          if (previous) {
            try {
              await handle.configure({ ...previous, fps: this.fps });
            } catch (restoreError) {
              cameraLogger.error("DeviceSession: Failed to restore previous resolution", {
                previous,
                error: toError(restoreError).message,
              });
            }
          }
          return { success: false, message: `Failed to set resolution: ${message}` };
        }
      },
      { operation: "set_resolution", devicePath: this.devicePath },
    );
  }

  /**
   * Keep the current resolution fixed until the returned release function
   * is called
   */
  holdResolution(owner: string): () => void {
    const token = Symbol(owner);
    this.resolutionHolds.set(token, owner);
    return () => {
      this.resolutionHolds.delete(token);
    };
  }

  /**
   * Validate locally, then write the control to the device.
   * Never retried.
   */
  async setControlValue(name: string, value: number): Promise<ControlWriteResult> {
    try {
      this.registry.validate(name, value);
    } catch (error) {
      if (error instanceof UnknownControlError || error instanceof ControlOutOfRangeError) {
        return { success: false, message: error.message, error };
      }
      throw error;
    }

    return this.mutex.acquire(
      async (): Promise<ControlWriteResult> => {
        let outcome: ControlApplyOutcome;
        if (this.state !== "streaming") {
          outcome = { success: false, error: "camera is not streaming" };
        } else {
          try {
            outcome = await this.backend.applyControl(this.devicePath, name, value);
          } catch (error) {
            outcome = { success: false, error: toError(error).message };
          }
        }

        if (outcome.success) {
          this.registry.recordValue(name, value);
          cameraLogger.info(`DeviceSession: Set ${name} = ${value}`);
          return { success: true, message: `Set ${name} = ${value}` };
        }

        const error = new ControlApplyFailedError(name, value, outcome.error, {
          devicePath: this.devicePath,
        });
        cameraLogger.warn(`DeviceSession: ${error.message}`);
        return { success: false, message: error.message, error };
      },
      { operation: "set_control", devicePath: this.devicePath },
    );
  }

  /**
   * Release and reopen the device, restoring calculated control defaults
   * and the previous format when it is still supported
   */
  async reinitialize(): Promise<void> {
    if (this.closing || this.state === "closed") {
      throw new CameraNotInitializedError("reinitialize");
    }

    await this.mutex.acquire(
      async () => {
        if (this.closing) {
          return;
        }

        const previous = this.currentFormat;
        this.state = "reinitializing";
        cameraLogger.info("DeviceSession: Reinitializing", {
          devicePath: this.devicePath,
          previous,
        });

        const old = this.handle;
        this.handle = null;
        if (old) {
          await this.safeRelease(old);
        }
        await sleep(this.reopenSettleMs);

        try {
          await this.initializeDevice(previous);
        } catch (error) {
          const failure = new ReinitializationFailedError(this.devicePath, toError(error));
          this.state = "failed";
          cameraLogger.error(`DeviceSession: ${failure.message}`, failure.toJSON());
          this.emit("session:failed", {
            devicePath: this.devicePath,
            error: failure.message,
          });
          throw failure;
        }

        // close() began while the device was reopening
        if (this.closing) {
          const reopened = this.handle;
          this.handle = null;
          this.state = "closed";
          if (reopened) {
            await this.safeRelease(reopened);
          }
          return;
        }

        this.hub.drain();
        this.reinitializations += 1;
        cameraLogger.info("DeviceSession: Reinitialized", {
          devicePath: this.devicePath,
          resolution: this.currentFormat,
        });
        this.emit("session:reinitialized", {
          devicePath: this.devicePath,
          resolution: this.currentFormat,
        });
      },
      { operation: "reinitialize", devicePath: this.devicePath },
    );

    // A failed session's production loop has ended; resume it
    if (this.startProducer && !this.hub.isRunning() && this.state === "streaming") {
      this.hub.start(this);
    }
  }

  /**
   * Write every stored default, then reinitialize the device
   */
  async resetToStoredDefaults(): Promise<ResetDefaultsResult> {
    const stored = this.registry.getStoredDefaults();
    const failed: string[] = [];

    await this.mutex.acquire(
      async () => {
        for (const [name, value] of Object.entries(stored)) {
          let outcome: ControlApplyOutcome;
          try {
            outcome = await this.backend.applyControl(this.devicePath, name, value);
          } catch (error) {
            outcome = { success: false, error: toError(error).message };
          }
          if (outcome.success) {
            this.registry.recordValue(name, value);
          } else {
            failed.push(name);
          }
        }
      },
      { operation: "reset_defaults", devicePath: this.devicePath },
    );

    await this.reinitialize();

    const total = Object.keys(stored).length;
    return {
      success: failed.length === 0,
      message:
        failed.length === 0
          ? `Reset ${total} controls to stored defaults`
          : `Reset ${total - failed.length} of ${total} controls; failed: ${failed.join(", ")}`,
      failed,
    };
  }

  /**
   * Register a consumer to be stopped when the session closes.
   * Returns an unregister function.
   */
  registerConsumer(consumer: SessionConsumer): () => void {
    this.consumers.push(consumer);
    return () => {
      this.consumers = this.consumers.filter((c) => c !== consumer);
    };
  }

  /**
   * Stop consumers (newest first), close subscriptions, stop the production
   * loop and release the handle. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.performClose();
    }
    return this.closing;
  }

  private async performClose(): Promise<void> {
    cameraLogger.info("DeviceSession: Closing", { devicePath: this.devicePath });

    const consumers = [...this.consumers].reverse();
    this.consumers = [];
    for (const consumer of consumers) {
      try {
        await consumer.stop();
      } catch (error) {
        cameraLogger.warn(`DeviceSession: Failed to stop ${consumer.name}`, {
          error: toError(error).message,
        });
      }
    }

    this.hub.closeAll();
    this.state = "closed";
    await this.hub.stop();

    await this.mutex.acquire(
      async () => {
        const handle = this.handle;
        this.handle = null;
        if (handle) {
          await this.safeRelease(handle);
        }
        this.state = "closed";
      },
      { operation: "close", devicePath: this.devicePath },
    );

    this.currentFormat = null;
    cameraLogger.info("DeviceSession: Closed", { devicePath: this.devicePath });
    this.emit("session:closed", { devicePath: this.devicePath });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getState(): SessionState {
    return this.state;
  }

  isStreaming(): boolean {
    return this.state === "streaming";
  }

  getCurrentResolution(): CaptureFormat | null {
    return this.currentFormat ? { ...this.currentFormat } : null;
  }

  getSupportedFormats(): CaptureFormat[] {
    return this.supportedFormats.map((f) => ({ ...f }));
  }

  isResolutionHeld(): boolean {
    return this.resolutionHolds.size > 0;
  }

  listControls(): ControlDescriptor[] {
    return this.registry.list();
  }

  getAllCurrentValues(): ControlValues {
    return this.registry.getAllCurrentValues();
  }

  getStoredDefaults(): ControlValues {
    return this.registry.getStoredDefaults();
  }

  getOriginalHardwareDefaults(): ControlValues {
    return this.registry.getOriginalHardwareDefaults();
  }

  getStatus(): DeviceSessionStatus {
    return {
      devicePath: this.devicePath,
      state: this.state,
      resolution: this.getCurrentResolution(),
      supportedFormats: this.getSupportedFormats(),
      consecutiveReadFailures: this.consecutiveFailures,
      framesRead: this.framesRead,
      reinitializations: this.reinitializations,
      resolutionHolds: Array.from(new Set(this.resolutionHolds.values())),
    };
  }

  // ==========================================================================
  // Internals (callers hold the mutex)
  // ==========================================================================

  private isTerminal(): boolean {
    return this.closing !== null || this.state === "closed" || this.state === "failed";
  }

  private async initializeDevice(preferred: CaptureFormat | null): Promise<void> {
    this.state = "opening";

    let handle: DeviceHandle;
    try {
      handle = await this.backend.open(this.devicePath);
    } catch (error) {
      if (error instanceof DeviceUnavailableError) {
        throw error;
      }
      throw new DeviceUnavailableError(this.devicePath, toError(error).message);
    }

    try {
      let formats: CaptureFormat[];
      try {
        formats = await this.backend.listFormats(this.devicePath);
      } catch (error) {
        throw new NoSupportedFormatsError(this.devicePath, {
          metadata: { error: toError(error).message },
        });
      }
      if (formats.length === 0) {
        throw new NoSupportedFormatsError(this.devicePath);
      }
      const sorted = sortFormats(formats);

      let controls: ControlDescriptor[];
      try {
        controls = await this.registry.listControls();
      } catch (error) {
        throw new NoControlsFoundError(this.devicePath, {
          metadata: { error: toError(error).message },
        });
      }
      if (controls.length === 0) {
        throw new NoControlsFoundError(this.devicePath);
      }

      await this.registry.applyDefaults();

      const target =
        preferred && sorted.some((f) => sameFormat(f, preferred)) ? preferred : sorted[0];
      await handle.configure({ ...target, fps: this.fps });

      this.handle = handle;
      this.supportedFormats = sorted;
      this.currentFormat = { ...target };
      this.consecutiveFailures = 0;
      this.state = "streaming";
    } catch (error) {
      await this.safeRelease(handle);
      throw error;
    }
  }

  private async safeRelease(handle: DeviceHandle): Promise<void> {
    try {
      await handle.release();
    } catch (error) {
      cameraLogger.warn("DeviceSession: Failed to release device handle", {
        devicePath: this.devicePath,
        error: toError(error).message,
      });
    }
  }
}
