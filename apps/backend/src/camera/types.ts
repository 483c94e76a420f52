/**
 * Camera module type definitions
 */

import type { CameraDevice, CaptureFormat } from "@camstation/types";

// ============================================================================
// Frames
// ============================================================================

export type FrameEncoding = "jpeg" | "rgb24";

/**
 * Frame as delivered by a device handle, before the session stamps it
 */
export interface RawFrame {
  /** JPEG bytes or packed RGB pixels, depending on encoding */
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly encoding: FrameEncoding;
}

export interface Frame extends RawFrame {
  /** Producer order, assigned by the device session */
  readonly sequence: number;
  /** Epoch milliseconds at which the frame was read */
  readonly timestamp: number;
}

// ============================================================================
// Device Backend
// ============================================================================

export interface DeviceConfiguration extends CaptureFormat {
  fps: number;
}

/**
 * Exclusively owned handle to an opened capture device
 */
export interface DeviceHandle {
  readonly devicePath: string;
  isOpen(): boolean;
  configure(config: DeviceConfiguration): Promise<void>;
  /** Resolves null when no frame arrived within the timeout */
  read(timeoutMs: number): Promise<RawFrame | null>;
  release(): Promise<void>;
}

export type RawControlField = "min" | "max" | "step" | "default" | "value";

/**
 * Control as reported by the device, before classification
 */
export interface RawControlEntry {
  name: string;
  /** Kind tag as reported, e.g. "int", "bool", "menu", "int64" */
  type: string;
  fields: Partial<Record<RawControlField, number>>;
}

export interface ControlApplyOutcome {
  success: boolean;
  error?: string;
}

export interface DeviceBackend {
  readonly name: string;
  /** Devices sorted by the numeric index in their path */
  listDevices(): Promise<CameraDevice[]>;
  listFormats(devicePath: string): Promise<CaptureFormat[]>;
  listControls(devicePath: string): Promise<RawControlEntry[]>;
  applyControl(
    devicePath: string,
    name: string,
    value: number,
  ): Promise<ControlApplyOutcome>;
  open(devicePath: string): Promise<DeviceHandle>;
}

// ============================================================================
// Frame Distribution
// ============================================================================

export type ReadResult =
  | { status: "frame"; frame: Frame }
  | { status: "failed"; error?: string }
  | { status: "closed" };

export interface FrameSource {
  readFrame(): Promise<ReadResult>;
}

export type ConsumerKind = "preview" | "timelapse" | "recorder" | "capture";

/**
 * What happens when a frame arrives at a full queue:
 * replace-oldest keeps only the freshest frames, drop-newest discards the
 * incoming frame for that subscription
 */
export type OverflowPolicy = "replace-oldest" | "drop-newest";

export interface DeliveryPolicy {
  capacity: number;
  overflow: OverflowPolicy;
}

/**
 * Consumer the session stops on close
 */
export interface SessionConsumer {
  readonly name: string;
  stop(): Promise<unknown>;
}

// ============================================================================
// Encoding and Writing
// ============================================================================

export interface FrameEncoder {
  toJpeg(frame: Frame, quality: number): Promise<Buffer>;
}

export interface VideoWriterOptions {
  outputPath: string;
  width: number;
  height: number;
  fps: number;
  encoding: FrameEncoding;
}

export interface VideoWriter {
  readonly width: number;
  readonly height: number;
  write(frame: Frame): Promise<void>;
  close(): Promise<void>;
}

export type VideoWriterFactory = (options: VideoWriterOptions) => Promise<VideoWriter>;
