/**
 * Device Mutex
 *
 * FIFO async mutex guarding every access to the device handle.
 * Reads, configure, control writes, reinitialize and close queue in
 * arrival order, so the read loop and administrative calls interleave
 * fairly.
 */

import { cameraLogger } from "./logger";

export interface DeviceMutexContext {
  operation: string;
  devicePath?: string;
}

interface QueuedAcquire {
  resolve: () => void;
  context: DeviceMutexContext;
}

export class DeviceMutex {
  private locked = false;
  private queue: QueuedAcquire[] = [];
  private holder: DeviceMutexContext | null = null;

  /**
   * Get current lock status
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  getQueueLength(): number {
    return this.queue.length;
  }

  /**
   * Operation currently holding the lock, if any
   */
  getHolder(): DeviceMutexContext | null {
    return this.holder;
  }

  /**
   * Acquire the lock, run the operation, release the lock.
   * Waiters are served strictly in arrival order.
   */
  async acquire<T>(
    operation: () => Promise<T>,
    context: DeviceMutexContext,
  ): Promise<T> {
    if (this.locked) {
      cameraLogger.debug("DeviceMutex: Waiting for lock", {
        ...context,
        heldBy: this.holder?.operation,
        position: this.queue.length + 1,
      });
      // Ownership is handed over directly by release(), so the lock never
      // appears free while someone is queued
      await new Promise<void>((resolve) => {
        this.queue.push({ resolve, context });
      });
    } else {
      this.locked = true;
    }

    this.holder = context;
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  private release(): void {
    this.holder = null;
    const next = this.queue.shift();
    if (next) {
      next.resolve();
      return;
    }
    this.locked = false;
  }
}
