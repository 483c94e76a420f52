/**
 * FFmpeg Stream Plumbing Tests
 *
 * Source: apps/backend/src/camera/backends/ffmpeg-capture.ts,
 *         apps/backend/src/camera/writers/ffmpeg-writer.ts
 *
 * Critical Invariants:
 * - JPEG frames are cut at SOI/EOI markers across chunk boundaries
 * - Raw frames are cut at exactly the frame size
 * - MJPG devices are copied through; other formats become packed RGB
 */

import { describe, it, expect } from "vitest";
import { JpegStreamSplitter, RawFrameSplitter, buildCaptureArgs } from "../backends/ffmpeg-capture";
import { buildWriterArgs } from "../writers/ffmpeg-writer";

describe("JpegStreamSplitter", () => {
  it("cuts complete images and keeps the partial one", () => {
    const splitter = new JpegStreamSplitter();

    const frames = splitter.push(Buffer.from([0xff, 0xd8, 1, 2, 0xff, 0xd9, 0xff, 0xd8, 3]));

    expect(frames).toEqual([Buffer.from([0xff, 0xd8, 1, 2, 0xff, 0xd9])]);
    expect(splitter.pending()).toBe(3);
    expect(splitter.push(Buffer.from([0xff, 0xd9]))).toEqual([Buffer.from([0xff, 0xd8, 3, 0xff, 0xd9])]);
    expect(splitter.pending()).toBe(0);
  });

  it("drops bytes before the start marker", () => {
    const splitter = new JpegStreamSplitter();

    expect(splitter.push(Buffer.from([9, 9, 0xff, 0xd8, 5, 0xff, 0xd9]))).toEqual([
      Buffer.from([0xff, 0xd8, 5, 0xff, 0xd9]),
    ]);
  });

  it("joins a start marker split across chunks", () => {
    const splitter = new JpegStreamSplitter();

    expect(splitter.push(Buffer.from([1, 0xff]))).toEqual([]);
    expect(splitter.pending()).toBe(1);
    expect(splitter.push(Buffer.from([0xd8, 7, 0xff, 0xd9]))).toEqual([
      Buffer.from([0xff, 0xd8, 7, 0xff, 0xd9]),
    ]);
  });
});

describe("RawFrameSplitter", () => {
  it("cuts fixed-size frames across chunks", () => {
    const splitter = new RawFrameSplitter(4);

    expect(splitter.push(Buffer.from([1, 2, 3, 4, 5, 6]))).toEqual([Buffer.from([1, 2, 3, 4])]);
    expect(splitter.pending()).toBe(2);
    expect(splitter.push(Buffer.from([7, 8, 9, 10, 11, 12]))).toEqual([
      Buffer.from([5, 6, 7, 8]),
      Buffer.from([9, 10, 11, 12]),
    ]);
    expect(splitter.pending()).toBe(0);
  });

  it("rejects a non-positive frame size", () => {
    expect(() => new RawFrameSplitter(0)).toThrow(RangeError);
  });
});

describe("buildCaptureArgs()", () => {
  it("copies MJPG streams", () => {
    expect(buildCaptureArgs("/dev/video0", { format: "MJPG", width: 640, height: 480, fps: 15 })).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-f",
      "v4l2",
      "-input_format",
      "mjpeg",
      "-video_size",
      "640x480",
      "-framerate",
      "15",
      "-i",
      "/dev/video0",
      "-c:v",
      "copy",
      "-f",
      "mjpeg",
      "pipe:1",
    ]);
  });

  it("converts other formats to packed RGB", () => {
    const args = buildCaptureArgs("/dev/video2", { format: "YUYV", width: 320, height: 240, fps: 30 });

    expect(args.slice(5, 7)).toEqual(["-input_format", "yuyv422"]);
    expect(args.slice(-5)).toEqual(["-f", "rawvideo", "-pix_fmt", "rgb24", "pipe:1"]);
  });
});

describe("buildWriterArgs()", () => {
  it("copies JPEG frames into the container", () => {
    expect(
      buildWriterArgs({ outputPath: "/tmp/out.avi", width: 640, height: 480, fps: 15, encoding: "jpeg" }),
    ).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-y",
      "-f",
      "image2pipe",
      "-c:v",
      "mjpeg",
      "-framerate",
      "15",
      "-i",
      "pipe:0",
      "-c:v",
      "copy",
      "/tmp/out.avi",
    ]);
  });

  it("encodes raw frames at their size", () => {
    const args = buildWriterArgs({ outputPath: "/tmp/out.avi", width: 320, height: 240, fps: 10, encoding: "rgb24" });

    expect(args).toContain("320x240");
    expect(args.slice(-7)).toEqual(["-c:v", "mjpeg", "-q:v", "3", "-pix_fmt", "yuvj420p", "/tmp/out.avi"]);
  });
});
