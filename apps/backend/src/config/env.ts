import dotenv from "dotenv";
import { CAMERA_DEFAULTS, ENV_KEYS, FILE_PATHS, PORTS } from "@camstation/config";
import { createLogger } from "@camstation/utils";

// Load environment variables
dotenv.config();

const logger = createLogger("env");

export type CameraBackendKind = "v4l2" | "mock";

export const MOCK_FAILURE_MODES = [
  "none",
  "flaky_reads",
  "read_stall",
  "unavailable",
  "control_reject",
] as const;

export type MockFailureMode = (typeof MOCK_FAILURE_MODES)[number];

function parseIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseCameraBackend(raw: string | undefined): CameraBackendKind {
  if (raw === "v4l2" || raw === "mock") {
    return raw;
  }
  // V4L2 only exists on Linux
  return process.platform === "linux" ? "v4l2" : "mock";
}

export function parseMockFailureMode(raw: string | undefined): MockFailureMode {
  const match = MOCK_FAILURE_MODES.find((mode) => mode === raw);
  return match ?? "none";
}

export const env: {
  nodeEnv: string;
  port: number;
  databasePath: string;
  cameraBackend: CameraBackendKind;
  cameraDevice?: string;
  v4l2CtlPath: string;
  ffmpegPath: string;
  readFailureThreshold: number;
  readTimeoutMs: number;
  captureFps: number;
  previewJpegQuality: number;
  timelapseOutputPath: string;
  videoOutputPath: string;
  photoOutputPath: string;
  mockFailureMode: MockFailureMode;
  isDevelopment: boolean;
  isProduction: boolean;
} = {
  nodeEnv: process.env[ENV_KEYS.NODE_ENV] || "development",
  port: parseIntEnv(ENV_KEYS.BACKEND_PORT, PORTS.BACKEND),
  databasePath: process.env[ENV_KEYS.DATABASE_PATH] || FILE_PATHS.DATABASE,

  // Camera backend: 'v4l2' | 'mock'
  // Auto-detected based on platform if not specified
  cameraBackend: parseCameraBackend(process.env[ENV_KEYS.CAMERA_BACKEND]),
  cameraDevice: process.env[ENV_KEYS.CAMERA_DEVICE] || undefined,
  v4l2CtlPath: process.env[ENV_KEYS.V4L2_CTL_PATH] || "v4l2-ctl",
  ffmpegPath: process.env[ENV_KEYS.FFMPEG_PATH] || "ffmpeg",

  // Device session tuning
  readFailureThreshold: parseIntEnv(
    ENV_KEYS.READ_FAILURE_THRESHOLD,
    CAMERA_DEFAULTS.READ_FAILURE_THRESHOLD,
  ),
  readTimeoutMs: parseIntEnv(ENV_KEYS.READ_TIMEOUT_MS, CAMERA_DEFAULTS.READ_TIMEOUT_MS),
  captureFps: parseIntEnv(ENV_KEYS.CAPTURE_FPS, CAMERA_DEFAULTS.FPS),
  previewJpegQuality: parseIntEnv(
    ENV_KEYS.PREVIEW_JPEG_QUALITY,
    CAMERA_DEFAULTS.PREVIEW_JPEG_QUALITY,
  ),

  // Output directories
  timelapseOutputPath: process.env[ENV_KEYS.TIMELAPSE_OUTPUT_PATH] || FILE_PATHS.TIMELAPSE_DIR,
  videoOutputPath: process.env[ENV_KEYS.VIDEO_OUTPUT_PATH] || FILE_PATHS.VIDEOS_DIR,
  photoOutputPath: process.env[ENV_KEYS.PHOTO_OUTPUT_PATH] || FILE_PATHS.PHOTOS_DIR,

  // Mock backend failure simulation mode
  mockFailureMode: parseMockFailureMode(process.env[ENV_KEYS.MOCK_FAILURE_MODE]),

  isDevelopment: process.env[ENV_KEYS.NODE_ENV] === "development",
  isProduction: process.env[ENV_KEYS.NODE_ENV] === "production",
};

/**
 * Validate environment configuration, logging anything suspicious
 */
export function validateEnv(): boolean {
  const warnings: string[] = [];

  const requestedBackend = process.env[ENV_KEYS.CAMERA_BACKEND];
  if (requestedBackend && requestedBackend !== env.cameraBackend) {
    warnings.push(
      `Unknown CAMERA_BACKEND "${requestedBackend}", falling back to ${env.cameraBackend}`,
    );
  }

  if (env.isProduction && env.cameraBackend === "mock") {
    warnings.push(
      "Using mock camera backend in production - no real frames will be captured",
    );
  }

  if (env.readFailureThreshold < 1) {
    warnings.push("READ_FAILURE_THRESHOLD below 1 reinitializes on every failed read");
  }

  if (env.previewJpegQuality < 1 || env.previewJpegQuality > 100) {
    warnings.push("PREVIEW_JPEG_QUALITY must be between 1 and 100");
  }

  warnings.forEach((w) => logger.warn(w));

  return warnings.length === 0;
}
