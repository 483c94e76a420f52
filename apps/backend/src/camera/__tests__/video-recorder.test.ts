/**
 * Video Recorder Tests
 *
 * Source: apps/backend/src/camera/video-recorder.ts
 *
 * Critical Invariants:
 * - The resolution is held for the whole recording
 * - Frames whose size differs from the writer's are skipped
 * - Write failures are counted and recording continues
 * - stop() flushes queued frames, closes the writer and returns the path;
 *   stop while idle returns null
 * - A writer that fails to open leaves no hold behind
 */

import fs from "fs/promises";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DeviceSession } from "../device-session";
import { CameraNotInitializedError, WriterOpenFailedError } from "../errors";
import { VideoRecorder, type RecordingStoppedEvent } from "../video-recorder";
import { FakeBackend, FakeWriterFactory, makeFrame, makeTempDir, openTestSession } from "./fakes";

describe("VideoRecorder", () => {
  let outputDir: string;
  let session: DeviceSession;
  let factory: FakeWriterFactory;
  let recorder: VideoRecorder;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    session = await openTestSession(new FakeBackend());
    factory = new FakeWriterFactory();
    recorder = new VideoRecorder(session, {
      outputDir,
      writerFactory: factory.create,
      receiveTimeoutMs: 50,
      writeBackoffMs: 1,
    });
  });

  afterEach(async () => {
    await session.close();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  describe("start()", () => {
    it("names the file after the current time by default", async () => {
      const outputPath = await recorder.start();

      expect(path.dirname(outputPath)).toBe(outputDir);
      expect(path.basename(outputPath)).toMatch(/^record_\d{8}_\d{6}\.avi$/);
      expect(recorder.getStatus()).toMatchObject({ recording: true, outputPath });
    });

    it("sizes the writer to the current resolution", async () => {
      const outputPath = await recorder.start({ fps: 10 });

      expect(factory.last().options).toEqual({
        outputPath,
        width: 320,
        height: 240,
        fps: 10,
        encoding: "rgb24",
      });
    });

    it("copies JPEG frames for MJPG formats", async () => {
      await session.setResolution(1280, 720, "MJPG");

      await recorder.start();

      expect(factory.last().options).toMatchObject({ width: 1280, height: 720, fps: 15, encoding: "jpeg" });
    });

    it("keeps absolute file names and sanitizes relative ones", async () => {
      const absolute = path.join(outputDir, "clips", "take1.avi");
      expect(await recorder.start({ filename: absolute })).toBe(absolute);
      await recorder.stop();

      expect(await recorder.start({ filename: "my clip.avi" })).toBe(path.join(outputDir, "my_clip.avi"));
    });

    it("returns the active path while already recording", async () => {
      const first = await recorder.start();

      expect(await recorder.start({ filename: "other.avi" })).toBe(first);
      expect(factory.writers).toHaveLength(1);
    });

    it("requires a streaming session", async () => {
      await session.close();

      await expect(recorder.start()).rejects.toThrow(CameraNotInitializedError);
    });

    it("releases the resolution hold when the writer cannot be opened", async () => {
      factory.failOpen = true;
      const target = path.join(outputDir, "broken.avi");

      await expect(recorder.start({ filename: target })).rejects.toThrow(WriterOpenFailedError);
      await expect(recorder.start({ filename: target })).rejects.toThrow(
        `Failed to open video writer for ${target}: ffmpeg not found`,
      );

      expect(recorder.isRecording()).toBe(false);
      expect(session.isResolutionHeld()).toBe(false);
      expect((await session.setResolution(640, 480, "YUYV")).success).toBe(true);
    });
  });

  describe("while recording", () => {
    it("writes every frame in order", async () => {
      await recorder.start();
      for (const sequence of [1, 2, 3]) {
        session.hub.publish(makeFrame(sequence));
      }

      await vi.waitFor(() => expect(factory.last().written).toEqual([1, 2, 3]));
      expect(recorder.getStatus().framesWritten).toBe(3);
    });

    it("holds the resolution", async () => {
      await recorder.start();

      expect(await session.setResolution(640, 480, "YUYV")).toEqual({
        success: false,
        message: "Resolution is locked while recording is active",
      });
    });

    it("skips frames whose size differs from the writer", async () => {
      await recorder.start();

      session.hub.publish(makeFrame(1, { width: 640, height: 480 }));
      session.hub.publish(makeFrame(2));

      await vi.waitFor(() => expect(factory.last().written).toEqual([2]));
      expect(recorder.getStatus().framesSkipped).toBe(1);
    });

    it("counts write failures and keeps recording", async () => {
      await recorder.start();
      factory.last().failNext = 2;

      for (const sequence of [1, 2, 3]) {
        session.hub.publish(makeFrame(sequence));
      }

      await vi.waitFor(() => expect(factory.last().written).toEqual([3]));
      expect(recorder.getStatus()).toMatchObject({ recording: true, writeFailures: 2, framesWritten: 1 });
    });
  });

  describe("stop()", () => {
    it("flushes queued frames before closing the writer", async () => {
      const outputPath = await recorder.start();
      const writer = factory.last();
      let openGate = () => {};
      writer.gate = new Promise<void>((resolve) => {
        openGate = resolve;
      });
      const stopped = vi.fn();
      recorder.on("recording:stopped", stopped);

      for (let sequence = 1; sequence <= 10; sequence++) {
        session.hub.publish(makeFrame(sequence));
      }
      const stopping = recorder.stop();
      openGate();

      expect(await stopping).toBe(outputPath);
      expect(writer.written).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(writer.closed).toBe(true);
      const event: RecordingStoppedEvent = {
        outputPath,
        framesWritten: 10,
        framesSkipped: 0,
        writeFailures: 0,
        width: 320,
        height: 240,
      };
      expect(stopped).toHaveBeenCalledWith(event);
    });

    it("releases the hold and returns null when called again", async () => {
      await recorder.start();

      await recorder.stop();

      expect(await recorder.stop()).toBeNull();
      expect(recorder.isRecording()).toBe(false);
      expect(session.isResolutionHeld()).toBe(false);
      expect(session.hub.getSubscriptionCount()).toBe(0);
    });

    it("returns null when never started", async () => {
      await expect(recorder.stop()).resolves.toBeNull();
    });
  });

  it("is stopped by the session on close", async () => {
    await recorder.start();
    session.hub.publish(makeFrame(1));

    await session.close();

    expect(recorder.isRecording()).toBe(false);
    expect(factory.last().closed).toBe(true);
    expect(factory.last().written).toEqual([1]);
  });
});
