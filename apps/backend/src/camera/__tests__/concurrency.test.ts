/**
 * Shared Camera Concurrency Tests
 *
 * Runs the production loop against the fake backend with the preview, the
 * timelapse sampler and the recorder attached together, makes one of them
 * slow, and checks that the others keep moving.
 *
 * Source: apps/backend/src/camera/device-session.ts, frame-hub.ts,
 *         preview-encoder.ts, timelapse-sampler.ts, video-recorder.ts
 *
 * Critical Invariants:
 * - A stuck consumer never blocks the producer or the other consumers
 * - Control writes still get the device between reads
 * - The stuck consumer loses only its own overflow, in order
 * - A slow timelapse encode holds back neither the preview nor the recorder
 */

import fs from "fs/promises";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { DeviceSession } from "../device-session";
import { DELIVERY_POLICIES } from "../frame-hub";
import { PreviewEncoder } from "../preview-encoder";
import { TimelapseSampler } from "../timelapse-sampler";
import { VideoRecorder } from "../video-recorder";
import { FakeBackend, FakeEncoder, FakeWriterFactory, makeTempDir, openTestSession } from "./fakes";

describe("shared camera with a slow consumer", () => {
  let outputDir: string;
  let backend: FakeBackend;
  let session: DeviceSession;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    backend = new FakeBackend();
    backend.readDelayMs = 1;
    session = await openTestSession(backend, { startProducer: true });
  });

  afterEach(async () => {
    await session.close();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  function timelapseFiles(): Promise<string[]> {
    return fs.readdir(path.join(outputDir, "timelapse"));
  }

  it("keeps the preview, the timelapse and control writes moving past a stuck recorder", async () => {
    const preview = new PreviewEncoder(session, { encoder: new FakeEncoder(), receiveTimeoutMs: 50 });
    preview.start();
    const timelapse = new TimelapseSampler(session, {
      encoder: new FakeEncoder(),
      outputDir: path.join(outputDir, "timelapse"),
      receiveTimeoutMs: 50,
    });
    await timelapse.start({ intervalSeconds: 0.02 });
    const factory = new FakeWriterFactory();
    const recorder = new VideoRecorder(session, {
      outputDir,
      writerFactory: factory.create,
      receiveTimeoutMs: 50,
    });

    await recorder.start();
    const writer = factory.last();
    let openGate = () => {};
    writer.gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const capacity = DELIVERY_POLICIES.recorder.capacity;
    const readAtStart = session.getStatus().framesRead;
    await vi.waitFor(
      () => expect(session.getStatus().framesRead).toBeGreaterThan(readAtStart + capacity + 10),
      { timeout: 5000 },
    );

    const seen = preview.getCurrentFrame()?.sequence ?? 0;
    expect(await preview.waitForFrame(seen, 1000)).not.toBeNull();
    const written = timelapse.getStatus().framesWritten;
    await vi.waitFor(() => expect(timelapse.getStatus().framesWritten).toBeGreaterThan(written + 2), {
      timeout: 5000,
    });
    expect((await timelapseFiles()).length).toBeGreaterThanOrEqual(timelapse.getStatus().framesWritten);
    expect(await session.setControlValue("brightness", 8)).toMatchObject({ success: true });

    const recorderStats = session.hub.getStats().subscriptions.find((s) => s.kind === "recorder");
    expect(recorderStats?.queued).toBe(capacity);
    expect(recorderStats?.dropped).toBeGreaterThan(0);

    await timelapse.stop();
    const stopping = recorder.stop();
    openGate();
    await stopping;

    expect(writer.written).toHaveLength(capacity + 1);
    const first = writer.written[0];
    expect(writer.written).toEqual(Array.from({ length: capacity + 1 }, (_, i) => first + i));
  }, 15_000);

  it("keeps the preview and the recorder moving past a slow timelapse encoder", async () => {
    const preview = new PreviewEncoder(session, { encoder: new FakeEncoder(), receiveTimeoutMs: 50 });
    preview.start();
    const slowEncoder = new FakeEncoder();
    slowEncoder.delayMs = 2000;
    const timelapse = new TimelapseSampler(session, {
      encoder: slowEncoder,
      outputDir: path.join(outputDir, "timelapse"),
      receiveTimeoutMs: 50,
    });
    await timelapse.start({ intervalSeconds: 0.02 });
    const factory = new FakeWriterFactory();
    const recorder = new VideoRecorder(session, {
      outputDir,
      writerFactory: factory.create,
      receiveTimeoutMs: 50,
    });
    await recorder.start();
    const writer = factory.last();

    // The sampler is now inside its first encode
    await vi.waitFor(() => expect(slowEncoder.calls).toHaveLength(1), { timeout: 2000 });
    const recordedAtStart = writer.written.length;
    const first = await preview.waitForFrame(-1, 1000);
    expect(first).not.toBeNull();

    const next = await preview.waitForFrame(first?.sequence ?? 0, 1000);
    await vi.waitFor(() => expect(writer.written.length).toBeGreaterThan(recordedAtStart + 10), {
      timeout: 1000,
    });

    expect(next?.sequence).toBeGreaterThan(first?.sequence ?? 0);
    expect(slowEncoder.calls).toHaveLength(1);
    expect(timelapse.getStatus().framesWritten).toBe(0);
    const timelapseStats = session.hub.getStats().subscriptions.find((s) => s.kind === "timelapse");
    expect(timelapseStats?.queued).toBe(DELIVERY_POLICIES.timelapse.capacity);

    await recorder.stop();
    await timelapse.stop();
    expect(await timelapseFiles()).toEqual(["frame_00000.jpg"]);
  }, 10_000);
});
