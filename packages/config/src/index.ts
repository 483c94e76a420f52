/**
 * Shared configuration constants for the Camstation camera service
 */

// ============================================================================
// Service Ports
// ============================================================================

export const PORTS = {
  BACKEND: 4000,
} as const;

// ============================================================================
// API Endpoints
// ============================================================================

export const API_ENDPOINTS = {
  HEALTH: "/health",

  // Devices
  CAMERAS: "/api/cameras",
  CAMERAS_SELECT: "/api/cameras/select",

  // Active camera
  CAMERA_STATUS: "/api/camera/status",
  CAMERA_PREVIEW: "/api/camera/preview",
  CAMERA_SNAPSHOT: "/api/camera/snapshot",
  CAMERA_RESOLUTION: "/api/camera/resolution",
  CAMERA_REINITIALIZE: "/api/camera/reinitialize",
  CAMERA_CAPTURE: "/api/camera/capture",
  CAMERA_CONTROLS: "/api/camera/controls",
  CAMERA_CONTROLS_RESET: "/api/camera/controls/reset",

  // Capture modes
  TIMELAPSE_START: "/api/timelapse/start",
  TIMELAPSE_STOP: "/api/timelapse/stop",
  TIMELAPSE_STATUS: "/api/timelapse/status",
  RECORDING_START: "/api/recording/start",
  RECORDING_STOP: "/api/recording/stop",
  RECORDING_STATUS: "/api/recording/status",

  // Persistence
  SETTINGS: "/api/settings",
  CAPTURES: "/api/captures",

  // WebSocket
  WS_CAMERA: "/ws/camera",
} as const;

// ============================================================================
// Application Constants
// ============================================================================

export const APP_CONFIG = {
  APP_NAME: "Camstation",
  APP_VERSION: "0.1.0",

  // Pagination
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 500,
} as const;

// ============================================================================
// Camera Defaults
// ============================================================================

export const CAMERA_DEFAULTS = {
  /** Consecutive failed reads tolerated before the device is reinitialized */
  READ_FAILURE_THRESHOLD: 10,
  /** Upper bound for one blocking device read */
  READ_TIMEOUT_MS: 1000,
  /** Pause between closing and reopening the device */
  REOPEN_SETTLE_MS: 300,
  /** Frame rate requested from the device and used for recordings */
  FPS: 15,

  PREVIEW_JPEG_QUALITY: 70,
  /** ~30fps ceiling for MJPEG clients */
  PREVIEW_FRAME_INTERVAL_MS: 33,
  STILL_JPEG_QUALITY: 95,

  /** Consumers wake at least this often to observe stop requests */
  CONSUMER_RECEIVE_TIMEOUT_MS: 1000,
  TIMELAPSE_QUEUE_CAPACITY: 4,
  RECORDER_QUEUE_CAPACITY: 64,
  RECORDER_WRITE_BACKOFF_MS: 50,

  TIMELAPSE_INTERVAL_SECONDS: 5,
  PHOTO_CAPTURE_TIMEOUT_MS: 5000,

  /** Fallback when a format is not given on a resolution change */
  FORMAT: "MJPG",
} as const;

// ============================================================================
// File Paths
// ============================================================================

export const FILE_PATHS = {
  DATABASE: "./data/camstation.db",

  DATA_DIR: "./data",
  TIMELAPSE_DIR: "./data/timelapse",
  VIDEOS_DIR: "./data/videos",
  PHOTOS_DIR: "./data/photos",

  LOGS_DIR: "./logs",
  ERROR_LOG: "./logs/error.log",
  COMBINED_LOG: "./logs/combined.log",
} as const;

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  NODE_ENV: "NODE_ENV",

  BACKEND_PORT: "BACKEND_PORT",
  DATABASE_PATH: "DATABASE_PATH",

  CAMERA_BACKEND: "CAMERA_BACKEND",
  CAMERA_DEVICE: "CAMERA_DEVICE",
  V4L2_CTL_PATH: "V4L2_CTL_PATH",
  FFMPEG_PATH: "FFMPEG_PATH",

  READ_FAILURE_THRESHOLD: "READ_FAILURE_THRESHOLD",
  READ_TIMEOUT_MS: "READ_TIMEOUT_MS",
  CAPTURE_FPS: "CAPTURE_FPS",
  PREVIEW_JPEG_QUALITY: "PREVIEW_JPEG_QUALITY",

  TIMELAPSE_OUTPUT_PATH: "TIMELAPSE_OUTPUT_PATH",
  VIDEO_OUTPUT_PATH: "VIDEO_OUTPUT_PATH",
  PHOTO_OUTPUT_PATH: "PHOTO_OUTPUT_PATH",

  MOCK_FAILURE_MODE: "MOCK_FAILURE_MODE",
} as const;

// ============================================================================
// HTTP Status Codes
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

// ============================================================================
// Error Messages
// ============================================================================

export const ERROR_MESSAGES = {
  INTERNAL_ERROR: "An internal error occurred",
  VALIDATION_ERROR: "Validation failed",

  CAMERA_NOT_INITIALIZED: "Camera not initialized",
  CAMERA_INIT_FAILED: "Failed to initialize camera",
  NO_CAMERAS_FOUND: "No cameras found",
  CAPTURE_FAILED: "Photo capture failed",
  PREVIEW_UNAVAILABLE: "No preview frame available",
  MISSING_CONTROL: "Missing control name or value",
  MISSING_DEVICE: "Missing device",
} as const;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if environment is production
 */
export function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

/**
 * Check if environment is development
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
