/**
 * Timelapse Sampler Tests
 *
 * Source: apps/backend/src/camera/timelapse-sampler.ts
 *
 * Critical Invariants:
 * - The first frame is written right away, then one per elapsed interval
 * - Missed ticks are skipped, never caught up
 * - The file counter survives stop/start and only advances on a written file
 * - Stopping restores the resolution and controls active at start
 */

import fs from "fs/promises";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DeviceSession } from "../device-session";
import { TimelapseSampler, type TimelapseCapturedEvent } from "../timelapse-sampler";
import { FakeBackend, FakeEncoder, makeFrame, makeTempDir, openTestSession } from "./fakes";

describe("TimelapseSampler", () => {
  let outputDir: string;
  let session: DeviceSession;
  let encoder: FakeEncoder;
  let sampler: TimelapseSampler;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    session = await openTestSession(new FakeBackend());
    encoder = new FakeEncoder();
    sampler = new TimelapseSampler(session, { encoder, outputDir, receiveTimeoutMs: 50 });
  });

  afterEach(async () => {
    await session.close();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("writes the first frame, then one per interval, skipping missed ticks", async () => {
    await sampler.start({ intervalSeconds: 1 });

    for (const [sequence, timestamp] of [
      [1, 10_000],
      [2, 10_500],
      [3, 11_000],
      [4, 13_500],
      [5, 13_900],
    ]) {
      session.hub.publish(makeFrame(sequence, { timestamp }));
    }
    await vi.waitFor(() => expect(sampler.getStatus().framesWritten).toBe(3));

    expect((await fs.readdir(outputDir)).sort()).toEqual([
      "frame_00000.jpg",
      "frame_00001.jpg",
      "frame_00002.jpg",
    ]);
    expect(await fs.readFile(path.join(outputDir, "frame_00001.jpg"), "utf8")).toBe("jpeg:3:95");
    expect(sampler.getStatus().lastFramePath).toBe(path.join(outputDir, "frame_00002.jpg"));
  });

  it("emits timelapse:captured for every file", async () => {
    const captured = vi.fn();
    sampler.on("timelapse:captured", captured);
    await sampler.start({ intervalSeconds: 5 });

    session.hub.publish(makeFrame(1));
    await vi.waitFor(() => expect(captured).toHaveBeenCalledTimes(1));

    const event: TimelapseCapturedEvent = {
      filePath: path.join(outputDir, "frame_00000.jpg"),
      index: 0,
      sequence: 1,
      width: 320,
      height: 240,
      size: 9,
    };
    expect(captured).toHaveBeenCalledWith(event);
  });

  it("continues the file counter across stop and start", async () => {
    await sampler.start({ intervalSeconds: 1 });
    session.hub.publish(makeFrame(1));
    await vi.waitFor(() => expect(sampler.getStatus().framesWritten).toBe(1));
    await sampler.stop();

    await sampler.start({ intervalSeconds: 1 });
    session.hub.publish(makeFrame(2, { timestamp: 20_000 }));
    await vi.waitFor(() => expect(sampler.getStatus().framesWritten).toBe(2));

    expect((await fs.readdir(outputDir)).sort()).toEqual(["frame_00000.jpg", "frame_00001.jpg"]);
    expect(sampler.getStatus().nextIndex).toBe(2);
  });

  it("keeps numbering contiguous when a write fails", async () => {
    encoder.failNext = 1;
    await sampler.start({ intervalSeconds: 1 });

    session.hub.publish(makeFrame(1, { timestamp: 1000 }));
    await vi.waitFor(() => expect(encoder.calls).toHaveLength(1));
    session.hub.publish(makeFrame(2, { timestamp: 2000 }));
    await vi.waitFor(() => expect(sampler.getStatus().framesWritten).toBe(1));

    expect(sampler.getStatus().nextIndex).toBe(1);
    expect(await fs.readdir(outputDir)).toEqual(["frame_00000.jpg"]);
  });

  it("applies the override and restores the previous settings on stop", async () => {
    await sampler.start({
      intervalSeconds: 1,
      override: {
        resolution: { format: "YUYV", width: 640, height: 480 },
        controls: { brightness: 20 },
      },
    });

    expect(session.getCurrentResolution()).toEqual({ format: "YUYV", width: 640, height: 480 });
    expect(session.getAllCurrentValues().brightness).toBe(20);
    await session.setControlValue("contrast", 70);

    await sampler.stop();

    expect(session.getCurrentResolution()).toEqual({ format: "YUYV", width: 320, height: 240 });
    expect(session.getAllCurrentValues()).toMatchObject({ brightness: 0, contrast: 50 });
  });

  it("keeps running when the override cannot be applied", async () => {
    const status = await sampler.start({
      intervalSeconds: 1,
      override: { resolution: { format: "YUYV", width: 800, height: 600 }, controls: { gain: 3 } },
    });

    expect(status.running).toBe(true);
    expect(session.getCurrentResolution()).toEqual({ format: "YUYV", width: 320, height: 240 });
  });

  it("rejects a non-positive interval", async () => {
    await expect(sampler.start({ intervalSeconds: 0 })).rejects.toThrow(RangeError);
    expect(sampler.isRunning()).toBe(false);
  });

  it("ignores start while running and stop while idle", async () => {
    await expect(sampler.stop()).resolves.toMatchObject({ running: false });

    await sampler.start({ intervalSeconds: 2 });
    const again = await sampler.start({ intervalSeconds: 7 });

    expect(again.intervalSeconds).toBe(2);
    expect(session.hub.getSubscriptionCount()).toBe(1);
  });

  it("writes to the output directory given at start", async () => {
    const other = path.join(outputDir, "nested");
    await sampler.start({ intervalSeconds: 1, outputDir: other });
    session.hub.publish(makeFrame(1));
    await vi.waitFor(() => expect(sampler.getStatus().framesWritten).toBe(1));

    expect(await fs.readdir(other)).toEqual(["frame_00000.jpg"]);
    expect(sampler.getStatus().outputDir).toBe(other);
  });

  it("is stopped by the session on close", async () => {
    await sampler.start({ intervalSeconds: 1 });

    await session.close();

    expect(sampler.isRunning()).toBe(false);
    expect(session.hub.getSubscriptionCount()).toBe(0);
  });
});
