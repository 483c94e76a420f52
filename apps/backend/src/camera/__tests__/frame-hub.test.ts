/**
 * Frame Hub Tests
 *
 * Tests per-subscription delivery and the production loop.
 *
 * Source: apps/backend/src/camera/frame-hub.ts
 *
 * Critical Invariants:
 * - publish() never blocks on a consumer
 * - Latest-only subscriptions always hold the newest frame
 * - Bounded subscriptions drop incoming frames when full, and only their own
 * - Closing wakes blocked receivers; queued frames stay receivable
 * - The loop backs off on failed reads and ends when the source closes
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { DELIVERY_POLICIES, FrameHub, FrameSubscription } from "../frame-hub";
import type { FrameSource, ReadResult } from "../types";
import { makeFrame } from "./fakes";

function scriptedSource(results: ReadResult[]): FrameSource & { reads: number } {
  const source: FrameSource & { reads: number } = {
    reads: 0,
    async readFrame(): Promise<ReadResult> {
      const next: ReadResult = results[source.reads] ?? { status: "closed" };
      source.reads += 1;
      return next;
    },
  };
  return source;
}

describe("FrameSubscription", () => {
  it("keeps only the newest frame under replace-oldest", async () => {
    const subscription = new FrameSubscription("preview", DELIVERY_POLICIES.preview);

    expect(subscription.offer(makeFrame(1))).toBe(true);
    expect(subscription.offer(makeFrame(2))).toBe(true);
    expect(subscription.offer(makeFrame(3))).toBe(true);

    expect((await subscription.receive(10))?.sequence).toBe(3);
    expect(subscription.getStats()).toEqual({ kind: "preview", queued: 0, delivered: 3, dropped: 2 });
  });

  it("drops incoming frames when a drop-newest queue is full", async () => {
    const subscription = new FrameSubscription("timelapse", { capacity: 2, overflow: "drop-newest" });

    expect(subscription.offer(makeFrame(1))).toBe(true);
    expect(subscription.offer(makeFrame(2))).toBe(true);
    expect(subscription.offer(makeFrame(3))).toBe(false);

    expect((await subscription.receive(10))?.sequence).toBe(1);
    expect((await subscription.receive(10))?.sequence).toBe(2);
    expect(await subscription.receive(10)).toBeNull();
    expect(subscription.getStats().dropped).toBe(1);
  });

  it("hands a frame straight to a blocked receiver", async () => {
    const subscription = new FrameSubscription("recorder", DELIVERY_POLICIES.recorder);
    const pending = subscription.receive(1000);

    subscription.offer(makeFrame(7));

    expect((await pending)?.sequence).toBe(7);
    expect(subscription.size()).toBe(0);
  });

  it("resolves null when nothing arrives within the timeout", async () => {
    const subscription = new FrameSubscription("capture", DELIVERY_POLICIES.capture);

    expect(await subscription.receive(5)).toBeNull();
  });

  it("wakes blocked receivers on close", async () => {
    const subscription = new FrameSubscription("recorder", DELIVERY_POLICIES.recorder);
    const pending = subscription.receive(60_000);

    subscription.close();

    expect(await pending).toBeNull();
    expect(subscription.isClosed()).toBe(true);
    expect(subscription.offer(makeFrame(1))).toBe(false);
  });

  it("returns queued frames after close, then null", async () => {
    const subscription = new FrameSubscription("recorder", DELIVERY_POLICIES.recorder);
    subscription.offer(makeFrame(1));
    subscription.offer(makeFrame(2));

    subscription.close();

    expect((await subscription.receive(10))?.sequence).toBe(1);
    expect((await subscription.receive(10))?.sequence).toBe(2);
    expect(await subscription.receive(10)).toBeNull();
  });
});

describe("FrameHub", () => {
  let hub: FrameHub;

  beforeEach(() => {
    hub = new FrameHub({ failedReadBackoffMs: 1 });
  });

  it("isolates a slow consumer from the others", async () => {
    const preview = hub.attach("preview");
    const recorder = hub.attach("recorder");
    const capacity = DELIVERY_POLICIES.recorder.capacity;

    for (let sequence = 1; sequence <= capacity + 10; sequence++) {
      hub.publish(makeFrame(sequence));
    }

    expect((await preview.receive(10))?.sequence).toBe(capacity + 10);
    expect(recorder.size()).toBe(capacity);
    expect((await recorder.receive(10))?.sequence).toBe(1);
    expect(recorder.getStats().dropped).toBe(10);
  });

  it("counts the subscriptions that accepted a frame", () => {
    hub.attach("preview");
    hub.attach("capture");

    expect(hub.publish(makeFrame(1))).toBe(2);
    // The capture queue is full, the preview replaces its frame
    expect(hub.publish(makeFrame(2))).toBe(1);
  });

  it("stops delivering to detached subscriptions", () => {
    const subscription = hub.attach("timelapse");

    hub.detach(subscription);
    hub.publish(makeFrame(1));

    expect(subscription.isClosed()).toBe(true);
    expect(subscription.size()).toBe(0);
    expect(hub.getSubscriptionCount()).toBe(0);
  });

  it("drains every queue", () => {
    const timelapse = hub.attach("timelapse");
    const recorder = hub.attach("recorder");
    hub.publish(makeFrame(1));
    hub.publish(makeFrame(2));

    hub.drain();

    expect(timelapse.size()).toBe(0);
    expect(recorder.size()).toBe(0);
    expect(hub.getSubscriptionCount()).toBe(2);
  });

  it("closes and forgets every subscription", async () => {
    const subscription = hub.attach("preview");
    const pending = subscription.receive(60_000);

    hub.closeAll();

    expect(await pending).toBeNull();
    expect(hub.getSubscriptionCount()).toBe(0);
  });

  describe("production loop", () => {
    it("publishes frames, skips failed reads and ends when the source closes", async () => {
      const recorder = hub.attach("recorder");
      const source = scriptedSource([
        { status: "frame", frame: makeFrame(1) },
        { status: "failed", error: "timeout" },
        { status: "frame", frame: makeFrame(2) },
        { status: "closed" },
      ]);

      hub.start(source);
      await vi.waitFor(() => expect(hub.isRunning()).toBe(false));

      expect(source.reads).toBe(4);
      expect((await recorder.receive(10))?.sequence).toBe(1);
      expect((await recorder.receive(10))?.sequence).toBe(2);
      expect(hub.getStats().published).toBe(2);
    });

    it("treats a throwing source as a failed read", async () => {
      let calls = 0;
      const source: FrameSource = {
        async readFrame(): Promise<ReadResult> {
          calls += 1;
          if (calls === 1) {
            throw new Error("boom");
          }
          return { status: "closed" };
        },
      };

      hub.start(source);
      await vi.waitFor(() => expect(hub.isRunning()).toBe(false));

      expect(calls).toBe(2);
    });

    it("stop() ends a loop that keeps failing", async () => {
      const source: FrameSource = {
        async readFrame(): Promise<ReadResult> {
          return { status: "failed" };
        },
      };
      const slowHub = new FrameHub({ failedReadBackoffMs: 60_000 });

      slowHub.start(source);
      await slowHub.stop();

      expect(slowHub.isRunning()).toBe(false);
    });
  });
});
