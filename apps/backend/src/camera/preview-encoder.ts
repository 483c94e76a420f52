/**
 * Live Preview Encoder
 *
 * Latest-only consumer: keeps the most recent frame compressed to JPEG so
 * HTTP clients can peek at it or wait for the next one. Never holds more
 * than one pending frame.
 */

import { CAMERA_DEFAULTS } from "@camstation/config";
import { cameraLogger } from "./logger";
import { toError } from "./errors";
import type { DeviceSession } from "./device-session";
import type { FrameSubscription } from "./frame-hub";
import type { FrameEncoder, SessionConsumer } from "./types";

export interface EncodedFrame {
  data: Buffer;
  sequence: number;
  width: number;
  height: number;
  timestamp: number;
}

export interface PreviewEncoderOptions {
  encoder: FrameEncoder;
  quality?: number;
  receiveTimeoutMs?: number;
}

interface FrameWaiter {
  afterSequence: number;
  resolve: (frame: EncodedFrame | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class PreviewEncoder implements SessionConsumer {
  readonly name = "preview";

  private readonly encoder: FrameEncoder;
  private readonly quality: number;
  private readonly receiveTimeoutMs: number;

  private subscription: FrameSubscription | null = null;
  private unregister: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private running = false;
  private current: EncodedFrame | null = null;
  private waiters = new Set<FrameWaiter>();
  private framesEncoded = 0;
  private encodeFailures = 0;

  private readonly onSessionFailed = (): void => {
    // Serving the last good frame would show a frozen image
    this.current = null;
  };

  constructor(
    private readonly session: DeviceSession,
    options: PreviewEncoderOptions,
  ) {
    this.encoder = options.encoder;
    this.quality = options.quality ?? CAMERA_DEFAULTS.PREVIEW_JPEG_QUALITY;
    this.receiveTimeoutMs =
      options.receiveTimeoutMs ?? CAMERA_DEFAULTS.CONSUMER_RECEIVE_TIMEOUT_MS;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    const subscription = this.session.hub.attach("preview");
    this.subscription = subscription;
    this.unregister = this.session.registerConsumer(this);
    this.session.on("session:failed", this.onSessionFailed);
    this.loop = this.run(subscription);
    cameraLogger.info("PreviewEncoder: Started", { quality: this.quality });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    const subscription = this.subscription;
    this.subscription = null;
    if (subscription) {
      this.session.hub.detach(subscription);
    }
    await this.loop;
    this.loop = null;

    this.session.off("session:failed", this.onSessionFailed);
    this.unregister?.();
    this.unregister = null;
    this.current = null;
    this.resolveWaiters(null);
    cameraLogger.info("PreviewEncoder: Stopped", {
      framesEncoded: this.framesEncoded,
      encodeFailures: this.encodeFailures,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Last encoded frame, or null. Never blocks and never consumes.
   */
  getCurrentFrame(): EncodedFrame | null {
    return this.current;
  }

  /**
   * Resolve with the first encoded frame newer than afterSequence, or null
   * when none arrives within the timeout
   */
  waitForFrame(afterSequence: number, timeoutMs: number): Promise<EncodedFrame | null> {
    const current = this.current;
    if (current && current.sequence > afterSequence) {
      return Promise.resolve(current);
    }
    if (!this.running) {
      return Promise.resolve(null);
    }

    return new Promise<EncodedFrame | null>((resolve) => {
      const waiter: FrameWaiter = {
        afterSequence,
        resolve,
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.add(waiter);
    });
  }

  getStats(): { running: boolean; framesEncoded: number; encodeFailures: number; sequence: number | null } {
    return {
      running: this.running,
      framesEncoded: this.framesEncoded,
      encodeFailures: this.encodeFailures,
      sequence: this.current?.sequence ?? null,
    };
  }

  private async run(subscription: FrameSubscription): Promise<void> {
    while (this.running) {
      const frame = await subscription.receive(this.receiveTimeoutMs);
      if (!frame) {
        if (subscription.isClosed()) break;
        continue;
      }

      try {
        const data = await this.encoder.toJpeg(frame, this.quality);
        const encoded: EncodedFrame = {
          data,
          sequence: frame.sequence,
          width: frame.width,
          height: frame.height,
          timestamp: frame.timestamp,
        };
        this.current = encoded;
        this.framesEncoded += 1;
        this.resolveWaiters(encoded);
      } catch (error) {
        this.encodeFailures += 1;
        cameraLogger.warn("PreviewEncoder: Failed to encode frame", {
          sequence: frame.sequence,
          error: toError(error).message,
        });
      }
    }
  }

  private resolveWaiters(frame: EncodedFrame | null): void {
    for (const waiter of this.waiters) {
      if (frame && frame.sequence <= waiter.afterSequence) {
        continue;
      }
      clearTimeout(waiter.timer);
      this.waiters.delete(waiter);
      waiter.resolve(frame);
    }
  }
}
