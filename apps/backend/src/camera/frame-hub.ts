/**
 * Frame Distribution Hub
 *
 * Runs the production loop (one read at a time from the device session) and
 * fans every frame out to the attached subscriptions. Each subscription owns
 * a bounded queue, so a slow consumer only ever loses its own frames.
 */

import { nanoid } from "nanoid";
import { CAMERA_DEFAULTS } from "@camstation/config";
import { cameraLogger } from "./logger";
import { toError } from "./errors";
import type {
  ConsumerKind,
  DeliveryPolicy,
  Frame,
  FrameSource,
  ReadResult,
} from "./types";

export const DELIVERY_POLICIES: Record<ConsumerKind, DeliveryPolicy> = {
  preview: { capacity: 1, overflow: "replace-oldest" },
  timelapse: { capacity: CAMERA_DEFAULTS.TIMELAPSE_QUEUE_CAPACITY, overflow: "drop-newest" },
  recorder: { capacity: CAMERA_DEFAULTS.RECORDER_QUEUE_CAPACITY, overflow: "drop-newest" },
  capture: { capacity: 1, overflow: "drop-newest" },
};

const FAILED_READ_BACKOFF_MS = 100;

interface PendingReceive {
  resolve: (frame: Frame | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class FrameSubscription {
  readonly id = nanoid(10);
  private queue: Frame[] = [];
  private waiters: PendingReceive[] = [];
  private closed = false;
  private delivered = 0;
  private dropped = 0;

  constructor(
    readonly kind: ConsumerKind,
    readonly policy: DeliveryPolicy,
  ) {}

  /**
   * Hand a frame to this subscription. Never blocks.
   * Returns false when the frame was dropped.
   */
  offer(frame: Frame): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.delivered += 1;
      waiter.resolve(frame);
      return true;
    }

    if (this.queue.length < this.policy.capacity) {
      this.queue.push(frame);
      this.delivered += 1;
      return true;
    }

    this.dropped += 1;
    if (this.policy.overflow === "replace-oldest") {
      this.queue.shift();
      this.queue.push(frame);
      this.delivered += 1;
      return true;
    }
    return false;
  }

  /**
   * Next frame in producer order, or null on timeout or once closed and empty
   */
  receive(timeoutMs: number): Promise<Frame | null> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<Frame | null>((resolve) => {
      const pending: PendingReceive = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== pending);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(pending);
    });
  }

  /**
   * Discard every queued frame, returning how many were discarded
   */
  clear(): number {
    const count = this.queue.length;
    this.queue = [];
    return count;
  }

  /**
   * Stop accepting frames and wake blocked receivers.
   * Frames already queued can still be received.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.queue.length;
  }

  getStats(): { kind: ConsumerKind; queued: number; delivered: number; dropped: number } {
    return {
      kind: this.kind,
      queued: this.queue.length,
      delivered: this.delivered,
      dropped: this.dropped,
    };
  }
}

export interface FrameHubOptions {
  /** Pause after a failed read before the next attempt */
  failedReadBackoffMs?: number;
}

export class FrameHub {
  private subscriptions = new Set<FrameSubscription>();
  private running = false;
  private loop: Promise<void> | null = null;
  private wakeBackoff: (() => void) | null = null;
  private published = 0;
  private readonly failedReadBackoffMs: number;

  constructor(options: FrameHubOptions = {}) {
    this.failedReadBackoffMs = options.failedReadBackoffMs ?? FAILED_READ_BACKOFF_MS;
  }

  /**
   * Start the production loop. No-op while already running.
   */
  start(source: FrameSource): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.run(source);
    cameraLogger.info("FrameHub: Production loop started");
  }

  /**
   * End the production loop and wait for the in-flight read to finish
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wakeBackoff?.();
    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
      cameraLogger.info("FrameHub: Production loop stopped");
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  attach(kind: ConsumerKind, policy: DeliveryPolicy = DELIVERY_POLICIES[kind]): FrameSubscription {
    const subscription = new FrameSubscription(kind, policy);
    this.subscriptions.add(subscription);
    cameraLogger.debug("FrameHub: Subscription attached", {
      id: subscription.id,
      kind,
      capacity: policy.capacity,
    });
    return subscription;
  }

  detach(subscription: FrameSubscription): void {
    if (this.subscriptions.delete(subscription)) {
      subscription.close();
      cameraLogger.debug("FrameHub: Subscription detached", {
        id: subscription.id,
        kind: subscription.kind,
      });
    }
  }

  /**
   * Deliver a frame to every subscription. Synchronous; never waits on a
   * consumer. Returns the number of subscriptions that accepted it.
   */
  publish(frame: Frame): number {
    this.published += 1;
    let accepted = 0;
    for (const subscription of this.subscriptions) {
      if (subscription.offer(frame)) {
        accepted += 1;
      }
    }
    return accepted;
  }

  /**
   * Clear every queue, e.g. after a resolution change
   */
  drain(): void {
    let discarded = 0;
    for (const subscription of this.subscriptions) {
      discarded += subscription.clear();
    }
    if (discarded > 0) {
      cameraLogger.debug(`FrameHub: Drained ${discarded} stale frames`);
    }
  }

  /**
   * Close and forget every subscription, waking blocked receivers
   */
  closeAll(): void {
    for (const subscription of this.subscriptions) {
      subscription.close();
    }
    this.subscriptions.clear();
  }

  getSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  getStats(): {
    running: boolean;
    published: number;
    subscriptions: ReturnType<FrameSubscription["getStats"]>[];
  } {
    return {
      running: this.running,
      published: this.published,
      subscriptions: Array.from(this.subscriptions, (s) => s.getStats()),
    };
  }

  private async run(source: FrameSource): Promise<void> {
    while (this.running) {
      let result: ReadResult;
      try {
        result = await source.readFrame();
      } catch (error) {
        result = { status: "failed", error: toError(error).message };
      }

      if (result.status === "closed") {
        cameraLogger.info("FrameHub: Source closed, ending production loop");
        break;
      }
      if (result.status === "failed") {
        if (this.running) {
          await this.backoff();
        }
        continue;
      }
      this.publish(result.frame);
    }
    this.running = false;
  }

  private backoff(): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeBackoff = null;
        resolve();
      }, this.failedReadBackoffMs);
      this.wakeBackoff = () => {
        clearTimeout(timer);
        this.wakeBackoff = null;
        resolve();
      };
    });
  }
}
