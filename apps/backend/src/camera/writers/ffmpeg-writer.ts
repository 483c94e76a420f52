/**
 * FFmpeg video writer
 *
 * Pipes frames into an ffmpeg process producing Motion-JPEG AVI files.
 * JPEG frames are copied into the container as they are; packed RGB frames
 * are encoded.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { once } from "events";
import { cameraLogger } from "../logger";
import type { Frame, VideoWriter, VideoWriterFactory, VideoWriterOptions } from "../types";

const CLOSE_TIMEOUT_MS = 10_000;
const STDERR_TAIL_BYTES = 2048;

/**
 * Command line for writing one recording from stdin
 */
export function buildWriterArgs(options: VideoWriterOptions): string[] {
  const input =
    options.encoding === "jpeg"
      ? ["-f", "image2pipe", "-c:v", "mjpeg", "-framerate", String(options.fps), "-i", "pipe:0"]
      : [
          "-f",
          "rawvideo",
          "-pix_fmt",
          "rgb24",
          "-video_size",
          `${options.width}x${options.height}`,
          "-framerate",
          String(options.fps),
          "-i",
          "pipe:0",
        ];

  const output =
    options.encoding === "jpeg"
      ? ["-c:v", "copy"]
      : ["-c:v", "mjpeg", "-q:v", "3", "-pix_fmt", "yuvj420p"];

  return ["-hide_banner", "-loglevel", "error", "-y", ...input, ...output, options.outputPath];
}

export class FfmpegVideoWriter implements VideoWriter {
  readonly width: number;
  readonly height: number;
  private exited = false;
  private closing: Promise<void> | null = null;
  private stderrTail = "";

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly options: VideoWriterOptions,
  ) {
    this.width = options.width;
    this.height = options.height;

    child.stderr.on("data", (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });
    // EPIPE after ffmpeg died surfaces through write callbacks
    child.stdin.on("error", (error) => {
      cameraLogger.debug("FfmpegVideoWriter: stdin error", { error: error.message });
    });
    child.on("close", (code) => {
      this.exited = true;
      if (code !== 0 && !this.closing) {
        cameraLogger.error("FfmpegVideoWriter: ffmpeg exited unexpectedly", {
          outputPath: options.outputPath,
          code,
          stderr: this.stderrTail.trim() || undefined,
        });
      }
    });
  }

  static async open(ffmpegPath: string, options: VideoWriterOptions): Promise<FfmpegVideoWriter> {
    const args = buildWriterArgs(options);
    cameraLogger.debug("FfmpegVideoWriter: Starting", { args });
    const child = spawn(ffmpegPath, args, { stdio: ["pipe", "pipe", "pipe"] });
    // Rejects with the spawn error (e.g. ENOENT) when ffmpeg cannot start
    await once(child, "spawn");
    child.stdout.resume();
    return new FfmpegVideoWriter(child, options);
  }

  write(frame: Frame): Promise<void> {
    if (this.exited || this.closing) {
      return Promise.reject(
        new Error(`ffmpeg is not running for ${this.options.outputPath}`),
      );
    }
    return new Promise<void>((resolve, reject) => {
      this.child.stdin.write(frame.data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.finish();
    }
    return this.closing;
  }

  private async finish(): Promise<void> {
    if (this.exited) {
      return;
    }
    const closed = once(this.child, "close");
    this.child.stdin.end();
    const timer = setTimeout(() => {
      cameraLogger.warn("FfmpegVideoWriter: ffmpeg did not finish, killing it", {
        outputPath: this.options.outputPath,
      });
      this.child.kill("SIGKILL");
    }, CLOSE_TIMEOUT_MS);

    try {
      const [code]: unknown[] = await closed;
      if (code !== 0) {
        throw new Error(
          `ffmpeg exited with code ${String(code)}: ${this.stderrTail.trim() || "no output"}`,
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Writer factory bound to an ffmpeg binary
 */
export function createFfmpegWriterFactory(ffmpegPath: string): VideoWriterFactory {
  return (options) => FfmpegVideoWriter.open(ffmpegPath, options);
}
