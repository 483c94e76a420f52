/**
 * Camera Module
 * Shared-camera concurrency core: one device session feeding preview,
 * timelapse and recording consumers
 */

// Types
export * from "./types";
export * from "./errors";

// Core
export { DeviceMutex } from "./mutex";
export { ControlRegistry, classifyControl } from "./control-registry";
export { FrameHub, FrameSubscription, DELIVERY_POLICIES } from "./frame-hub";
export {
  DeviceSession,
  type DeviceSessionOptions,
  type DeviceSessionStatus,
  type ControlWriteResult,
  type ResetDefaultsResult,
} from "./device-session";

// Consumers
export { PreviewEncoder, type EncodedFrame } from "./preview-encoder";
export { TimelapseSampler, type TimelapseCapturedEvent } from "./timelapse-sampler";
export { VideoRecorder, type RecordingStoppedEvent } from "./video-recorder";

// Manager
export {
  CameraManager,
  type ActiveCamera,
  type CameraManagerOptions,
  type CameraManagerHealth,
  type CaptureOutputDirs,
  type CaptureSettingsSource,
} from "./camera-manager";

// Backends
export { createBackend, getBackendDisplayName } from "./backends/factory";
export { MockBackend } from "./backends/mock";
export { V4l2Backend } from "./backends/v4l2";
export { SharpFrameEncoder } from "./encoding/sharp-encoder";
export { createFfmpegWriterFactory } from "./writers/ffmpeg-writer";

// Logger
export { cameraLogger } from "./logger";
