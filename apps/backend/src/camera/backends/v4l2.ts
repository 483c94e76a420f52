/**
 * V4L2 device backend
 *
 * Introspection and control writes go through v4l2-ctl; frames come from an
 * ffmpeg capture process per opened device.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import fs from "fs/promises";
import { constants as fsConstants } from "fs";
import type { CameraDevice, CaptureFormat } from "@camstation/types";
import { cameraLogger } from "../logger";
import { DeviceCommandError, DeviceUnavailableError, toError } from "../errors";
import type {
  ControlApplyOutcome,
  DeviceBackend,
  DeviceHandle,
  RawControlEntry,
} from "../types";
import { FfmpegCaptureHandle } from "./ffmpeg-capture";
import { parseControlList, parseDeviceList, parseFormatList } from "./v4l2-parser";

const execFileAsync = promisify(execFile);

const LIST_TIMEOUT_MS = 10_000;
const SET_CONTROL_TIMEOUT_MS = 5_000;

export interface V4l2BackendOptions {
  v4l2CtlPath?: string;
  ffmpegPath?: string;
}

interface CommandFailure {
  stderr?: unknown;
  stdout?: unknown;
  message?: unknown;
}

function isCommandFailure(error: unknown): error is CommandFailure {
  return typeof error === "object" && error !== null;
}

function commandOutput(error: unknown): string {
  if (isCommandFailure(error)) {
    for (const candidate of [error.stderr, error.stdout, error.message]) {
      if (typeof candidate === "string" && candidate.trim()) {
        return candidate.trim();
      }
    }
  }
  return String(error);
}

export class V4l2Backend implements DeviceBackend {
  readonly name = "v4l2";
  private readonly v4l2CtlPath: string;
  private readonly ffmpegPath: string;

  constructor(options: V4l2BackendOptions = {}) {
    this.v4l2CtlPath = options.v4l2CtlPath ?? "v4l2-ctl";
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  }

  async listDevices(): Promise<CameraDevice[]> {
    try {
      const stdout = await this.run(["--list-devices"], LIST_TIMEOUT_MS);
      return parseDeviceList(stdout);
    } catch (error) {
      // v4l2-ctl exits non-zero when no device is present at all
      cameraLogger.warn("V4l2Backend: Device enumeration failed", {
        error: toError(error).message,
      });
      return [];
    }
  }

  async listFormats(devicePath: string): Promise<CaptureFormat[]> {
    const stdout = await this.run(
      [`--device=${devicePath}`, "--list-formats-ext"],
      LIST_TIMEOUT_MS,
    );
    return parseFormatList(stdout);
  }

  async listControls(devicePath: string): Promise<RawControlEntry[]> {
    const stdout = await this.run([`--device=${devicePath}`, "--list-ctrls"], LIST_TIMEOUT_MS);
    const entries = parseControlList(stdout);
    cameraLogger.debug(`V4l2Backend: Found ${entries.length} controls on ${devicePath}`);
    return entries;
  }

  async applyControl(
    devicePath: string,
    name: string,
    value: number,
  ): Promise<ControlApplyOutcome> {
    try {
      await this.run(
        [`--device=${devicePath}`, `--set-ctrl=${name}=${value}`],
        SET_CONTROL_TIMEOUT_MS,
      );
      return { success: true };
    } catch (error) {
      return { success: false, error: commandOutput(error) };
    }
  }

  async open(devicePath: string): Promise<DeviceHandle> {
    try {
      await fs.access(devicePath, fsConstants.R_OK | fsConstants.W_OK);
    } catch (error) {
      throw new DeviceUnavailableError(devicePath, toError(error).message);
    }
    return new FfmpegCaptureHandle(devicePath, this.ffmpegPath);
  }

  private async run(args: string[], timeout: number): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.v4l2CtlPath, args, {
        timeout,
        encoding: "utf8",
      });
      return stdout;
    } catch (error) {
      throw new DeviceCommandError(`${this.v4l2CtlPath} ${args.join(" ")}`, commandOutput(error));
    }
  }
}
