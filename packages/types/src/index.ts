/**
 * Shared types for the Camstation camera service
 */

// ============================================================================
// Device Types
// ============================================================================

export interface CameraDevice {
  /** Human readable name reported by the driver */
  name: string;
  /** Device node, e.g. /dev/video0 */
  path: string;
}

/** One supported capture mode: pixel format tag plus frame size */
export interface CaptureFormat {
  format: string;
  width: number;
  height: number;
}

export type SessionState = 'closed' | 'opening' | 'streaming' | 'reinitializing' | 'failed';

// ============================================================================
// Control Types
// ============================================================================

export type ControlKind = 'int' | 'bool' | 'menu';

export interface ControlDescriptor {
  name: string;
  kind: ControlKind;
  min: number;
  max: number;
  /** Always 1 for bool and menu controls */
  step: number;
  default: number;
  current: number;
}

export type ControlValues = Record<string, number>;

export interface OperationResult {
  success: boolean;
  message: string;
}

export interface ApplyDefaultsReport {
  applied: number;
  failed: string[];
  total: number;
}

// ============================================================================
// Camera API Types
// ============================================================================

export interface CameraStatusResponse {
  connected: boolean;
  devicePath: string | null;
  state: SessionState;
  resolution: CaptureFormat | null;
  supportedFormats: CaptureFormat[];
  consecutiveReadFailures: number;
  framesRead: number;
  previewAvailable: boolean;
  timelapse: TimelapseStatus;
  recording: RecordingStatus;
}

export interface CameraControlsResponse {
  controls: ControlDescriptor[];
  values: ControlValues;
  storedDefaults: ControlValues;
  originalHardwareDefaults: ControlValues;
}

export interface SetResolutionRequest {
  width: number;
  height: number;
  format?: string;
}

export interface SetControlRequest {
  name: string;
  value: number;
}

export interface CapturePhotoResponse {
  filePath: string;
  width: number;
  height: number;
  size: number;
}

export interface HealthCheckResponse {
  status: 'ok' | 'error';
  uptime: number;
  cameraConnected: boolean;
}

// ============================================================================
// Capture Mode Types
// ============================================================================

export interface TimelapseOverride {
  resolution?: CaptureFormat;
  controls?: ControlValues;
}

export interface TimelapseStartRequest {
  intervalSeconds?: number;
  outputDir?: string;
  override?: TimelapseOverride;
}

export interface TimelapseStatus {
  running: boolean;
  intervalSeconds: number | null;
  outputDir: string;
  framesWritten: number;
  nextIndex: number;
  lastFramePath: string | null;
}

export interface RecordingStartRequest {
  filename?: string;
  fps?: number;
}

export interface RecordingStatus {
  recording: boolean;
  outputPath: string | null;
  framesWritten: number;
  framesSkipped: number;
  writeFailures: number;
  startedAt: string | null;
}

// ============================================================================
// Persistence Types
// ============================================================================

export interface CaptureSettings {
  imageOutputDir: string;
  videoOutputDir: string;
  timelapseIntervalSeconds: number;
  /** Resolution and control values applied while a timelapse runs */
  timelapseOverride: TimelapseOverride | null;
}

export interface SaveSettingsRequest {
  imageOutputDir?: string;
  videoOutputDir?: string;
  timelapseIntervalSeconds?: number;
  timelapseOverride?: TimelapseOverride | null;
  /** Store the live resolution and control values as the timelapse override */
  snapshotCurrent?: boolean;
}

export type CaptureKind = 'timelapse' | 'recording' | 'photo';

export interface CaptureRecord {
  id: string;
  kind: CaptureKind;
  filePath: string;
  devicePath: string | null;
  width: number | null;
  height: number | null;
  fileSize: number | null;
  createdAt: Date;
}

// ============================================================================
// WebSocket Event Types
// ============================================================================

export type CameraEventType =
  | 'session:opened'
  | 'session:reinitialized'
  | 'session:failed'
  | 'session:closed'
  | 'timelapse:started'
  | 'timelapse:captured'
  | 'timelapse:stopped'
  | 'recording:started'
  | 'recording:stopped'
  | 'capture:photo';

export interface CameraEvent {
  event: CameraEventType;
  data: Record<string, unknown>;
  timestamp: string;
}

// ============================================================================
// Utility Types
// ============================================================================

export interface PaginationParams {
  page?: number;
  limit?: number;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
