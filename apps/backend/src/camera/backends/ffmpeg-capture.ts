/**
 * FFmpeg capture handle
 *
 * Streams frames from a V4L2 device through an ffmpeg child process.
 * MJPG devices are copied through as concatenated JPEGs; every other pixel
 * format is converted to packed RGB.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { once } from "events";
import { cameraLogger } from "../logger";
import { DeviceCommandError, toError } from "../errors";
import { frameEncodingFor } from "../formats";
import type { DeviceConfiguration, DeviceHandle, FrameEncoding, RawFrame } from "../types";

const JPEG_SOI = Buffer.from([0xff, 0xd8]);
const JPEG_EOI = Buffer.from([0xff, 0xd9]);
/** Frames buffered in the handle; older ones are dropped */
const MAX_BUFFERED_FRAMES = 2;
const STARTUP_TIMEOUT_MS = 2000;
const STOP_TIMEOUT_MS = 2000;
const STDERR_TAIL_BYTES = 2048;

const INPUT_FORMATS: Record<string, string> = {
  MJPG: "mjpeg",
  JPEG: "mjpeg",
  YUYV: "yuyv422",
  UYVY: "uyvy422",
  NV12: "nv12",
  YU12: "yuv420p",
  RGB3: "rgb24",
};

/**
 * Split a byte stream of concatenated JPEG images into whole images
 */
export class JpegStreamSplitter {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Buffer[] = [];

    for (;;) {
      const start = this.buffer.indexOf(JPEG_SOI);
      if (start === -1) {
        // Keep a trailing 0xFF, it may begin the next start marker
        this.buffer =
          this.buffer.length > 0 && this.buffer[this.buffer.length - 1] === 0xff
            ? this.buffer.subarray(this.buffer.length - 1)
            : Buffer.alloc(0);
        break;
      }

      const end = this.buffer.indexOf(JPEG_EOI, start + 2);
      if (end === -1) {
        // Incomplete frame: drop garbage before the start marker and wait
        if (start > 0) {
          this.buffer = this.buffer.subarray(start);
        }
        break;
      }

      frames.push(Buffer.from(this.buffer.subarray(start, end + 2)));
      this.buffer = this.buffer.subarray(end + 2);
    }

    return frames;
  }

  pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

/**
 * Split a raw video byte stream into fixed-size frames
 */
export class RawFrameSplitter {
  private chunks: Buffer[] = [];
  private buffered = 0;

  constructor(private readonly frameSize: number) {
    if (frameSize <= 0) {
      throw new RangeError("Frame size must be positive");
    }
  }

  push(chunk: Buffer): Buffer[] {
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    if (this.buffered < this.frameSize) {
      return [];
    }

    let data = Buffer.concat(this.chunks, this.buffered);
    const frames: Buffer[] = [];
    while (data.length >= this.frameSize) {
      frames.push(Buffer.from(data.subarray(0, this.frameSize)));
      data = data.subarray(this.frameSize);
    }
    this.chunks = data.length > 0 ? [data] : [];
    this.buffered = data.length;
    return frames;
  }

  pending(): number {
    return this.buffered;
  }
}

/**
 * Command line for streaming one device configuration to stdout
 */
export function buildCaptureArgs(devicePath: string, config: DeviceConfiguration): string[] {
  const tag = config.format.toUpperCase();
  const inputFormat = INPUT_FORMATS[tag] ?? config.format.toLowerCase();
  const args = [
    "-hide_banner",
    "-loglevel",
    "error",
    "-f",
    "v4l2",
    "-input_format",
    inputFormat,
    "-video_size",
    `${config.width}x${config.height}`,
    "-framerate",
    String(config.fps),
    "-i",
    devicePath,
  ];

  if (frameEncodingFor(config.format) === "jpeg") {
    args.push("-c:v", "copy", "-f", "mjpeg", "pipe:1");
  } else {
    args.push("-f", "rawvideo", "-pix_fmt", "rgb24", "pipe:1");
  }
  return args;
}

export class FfmpegCaptureHandle implements DeviceHandle {
  private process: ChildProcessWithoutNullStreams | null = null;
  private config: DeviceConfiguration | null = null;
  private frames: RawFrame[] = [];
  private waiter: ((frame: RawFrame | null) => void) | null = null;
  private firstFrame: (() => void) | null = null;
  private stderrTail = "";
  private released = false;

  constructor(
    readonly devicePath: string,
    private readonly ffmpegPath: string,
  ) {}

  isOpen(): boolean {
    return !this.released;
  }

  /**
   * Restart the capture process with a new configuration. Resolves once
   * the first frame arrives or the startup window passes; throws when
   * ffmpeg exits during startup.
   */
  async configure(config: DeviceConfiguration): Promise<void> {
    if (this.released) {
      throw new Error(`Device handle for ${this.devicePath} is released`);
    }
    await this.stopProcess();
    this.frames = [];
    this.stderrTail = "";

    const encoding = frameEncodingFor(config.format);
    const args = buildCaptureArgs(this.devicePath, config);
    cameraLogger.debug("FfmpegCapture: Starting", { devicePath: this.devicePath, args });

    const child = spawn(this.ffmpegPath, args, { stdio: ["pipe", "pipe", "pipe"] });
    try {
      await once(child, "spawn");
    } catch (error) {
      throw new DeviceCommandError(this.ffmpegPath, toError(error).message, {
        operation: "configure",
        devicePath: this.devicePath,
      });
    }

    this.process = child;
    this.config = config;
    this.attachStreams(child, config, encoding);

    const started = await this.waitForStartup(child);
    if (!started) {
      throw new DeviceCommandError(this.ffmpegPath, this.stderrTail, {
        operation: "configure",
        devicePath: this.devicePath,
        metadata: { width: config.width, height: config.height, format: config.format },
      });
    }
  }

  read(timeoutMs: number): Promise<RawFrame | null> {
    const next = this.frames.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.released || !this.process) {
      return Promise.resolve(null);
    }

    return new Promise<RawFrame | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (frame) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(frame);
      };
    });
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await this.stopProcess();
    this.frames = [];
    this.config = null;
  }

  private attachStreams(
    child: ChildProcessWithoutNullStreams,
    config: DeviceConfiguration,
    encoding: FrameEncoding,
  ): void {
    const split =
      encoding === "jpeg"
        ? new JpegStreamSplitter()
        : new RawFrameSplitter(config.width * config.height * 3);

    child.stdout.on("data", (chunk: Buffer) => {
      for (const data of split.push(chunk)) {
        this.deliver({ data, width: config.width, height: config.height, encoding });
      }
    });

    child.stderr.on("data", (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });

    child.on("error", (error) => {
      cameraLogger.error("FfmpegCapture: Process error", {
        devicePath: this.devicePath,
        error: error.message,
      });
    });

    child.on("close", (code, signal) => {
      if (this.process !== child) {
        return;
      }
      this.process = null;
      cameraLogger.warn("FfmpegCapture: Capture process exited", {
        devicePath: this.devicePath,
        code,
        signal,
        stderr: this.stderrTail.trim() || undefined,
      });
      this.waiter?.(null);
    });
  }

  private deliver(frame: RawFrame): void {
    this.firstFrame?.();
    if (this.waiter) {
      this.waiter(frame);
      return;
    }
    this.frames.push(frame);
    if (this.frames.length > MAX_BUFFERED_FRAMES) {
      this.frames.shift();
    }
  }

  private waitForStartup(child: ChildProcessWithoutNullStreams): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const finish = (started: boolean): void => {
        clearTimeout(timer);
        child.off("close", onClose);
        this.firstFrame = null;
        resolve(started);
      };
      const onClose = (): void => finish(false);
      const timer = setTimeout(() => finish(true), STARTUP_TIMEOUT_MS);
      this.firstFrame = () => finish(true);
      child.once("close", onClose);
    });
  }

  private async stopProcess(): Promise<void> {
    const child = this.process;
    this.process = null;
    this.waiter?.(null);
    if (!child || child.exitCode !== null || child.signalCode !== null) {
      return;
    }

    const closed = once(child, "close");
    child.kill("SIGTERM");
    const timer = setTimeout(() => child.kill("SIGKILL"), STOP_TIMEOUT_MS);
    try {
      await closed;
    } finally {
      clearTimeout(timer);
    }
  }

  getConfiguration(): DeviceConfiguration | null {
    return this.config;
  }
}
