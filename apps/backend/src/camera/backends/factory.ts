/**
 * Device Backend Factory
 * Creates the device backend selected by configuration
 */

import type { DeviceBackend } from "../types";
import { MockBackend } from "./mock";
import { V4l2Backend } from "./v4l2";
import { cameraLogger } from "../logger";
import type { CameraBackendKind, MockFailureMode } from "../../config/env";

export interface BackendFactoryOptions {
  v4l2CtlPath?: string;
  ffmpegPath?: string;
  mockFailureMode?: MockFailureMode;
}

/**
 * Create a device backend instance
 */
export function createBackend(
  type: CameraBackendKind,
  options: BackendFactoryOptions = {},
): DeviceBackend {
  cameraLogger.info("DeviceBackendFactory: Creating backend", {
    type,
    platform: process.platform,
  });

  switch (type) {
    case "v4l2":
      return new V4l2Backend({
        v4l2CtlPath: options.v4l2CtlPath,
        ffmpegPath: options.ffmpegPath,
      });

    case "mock":
      return new MockBackend({ failureMode: options.mockFailureMode });
  }
}

/**
 * Get display name for a backend type
 */
export function getBackendDisplayName(type: CameraBackendKind): string {
  switch (type) {
    case "v4l2":
      return "Video4Linux2 (v4l2-ctl + ffmpeg)";
    case "mock":
      return "Mock/Simulated Camera";
  }
}
