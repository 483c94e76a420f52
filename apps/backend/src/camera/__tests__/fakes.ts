/**
 * In-process stand-ins for the device backend, the JPEG encoder and the
 * video writer. Every fake records what was asked of it so suites can
 * assert call order without touching hardware or spawning processes.
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import type { CameraDevice, CaptureFormat } from "@camstation/types";
import { sleep } from "@camstation/utils";
import { DeviceSession, type DeviceSessionOptions } from "../device-session";
import { FrameHub } from "../frame-hub";
import type {
  ControlApplyOutcome,
  DeviceBackend,
  DeviceConfiguration,
  DeviceHandle,
  Frame,
  FrameEncoder,
  RawControlEntry,
  RawFrame,
  VideoWriter,
  VideoWriterFactory,
  VideoWriterOptions,
} from "../types";

export type ReadMode = "frames" | "fail" | "throw";

export const TEST_DEVICE = "/dev/video0";

export const TEST_FORMATS: CaptureFormat[] = [
  { format: "YUYV", width: 640, height: 480 },
  { format: "MJPG", width: 1280, height: 720 },
  { format: "YUYV", width: 320, height: 240 },
];

/**
 * Calculated defaults: brightness 0, contrast 50, backlight_compensation 0,
 * power_line_frequency 0, auto_exposure 1, exposure_time_absolute 1025
 */
export function testControls(): RawControlEntry[] {
  return [
    { name: "brightness", type: "int", fields: { min: -64, max: 64, step: 1, default: 0, value: 0 } },
    { name: "contrast", type: "int", fields: { min: 0, max: 100, step: 1, default: 32, value: 32 } },
    { name: "backlight_compensation", type: "bool", fields: { default: 1, value: 1 } },
    { name: "power_line_frequency", type: "menu", fields: { min: 0, max: 2, default: 1, value: 1 } },
    { name: "auto_exposure", type: "menu", fields: { min: 0, max: 3, default: 3, value: 3 } },
    {
      name: "exposure_time_absolute",
      type: "int",
      fields: { min: 3, max: 2047, step: 1, default: 250, value: 250 },
    },
    // Unsupported kind
    { name: "focus_absolute", type: "int64", fields: { min: 0, max: 250, step: 5, default: 0, value: 0 } },
    // Missing step
    { name: "zoom_absolute", type: "int", fields: { min: 100, max: 500, default: 100, value: 100 } },
  ];
}

export function makeFrame(sequence: number, overrides: Partial<Frame> = {}): Frame {
  return {
    data: Buffer.from([sequence & 0xff]),
    width: 320,
    height: 240,
    encoding: "rgb24",
    sequence,
    timestamp: sequence * 1000,
    ...overrides,
  };
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "camstation-test-"));
}

// ============================================================================
// Device backend
// ============================================================================

export class FakeHandle implements DeviceHandle {
  private open = true;
  readonly configured: DeviceConfiguration[] = [];
  reads = 0;

  constructor(
    readonly devicePath: string,
    private readonly backend: FakeBackend,
  ) {}

  isOpen(): boolean {
    return this.open;
  }

  currentConfig(): DeviceConfiguration | undefined {
    return this.configured[this.configured.length - 1];
  }

  async configure(config: DeviceConfiguration): Promise<void> {
    this.backend.log.push(`configure:${config.width}x${config.height}`);
    if (this.backend.rejectConfigure?.(config)) {
      throw new Error("configure failed");
    }
    this.configured.push({ ...config });
  }

  async read(_timeoutMs: number): Promise<RawFrame | null> {
    this.reads += 1;
    this.backend.log.push("read:start");
    if (this.backend.readDelayMs > 0) {
      await sleep(this.backend.readDelayMs);
    }
    this.backend.log.push("read:end");

    const config = this.currentConfig();
    if (!config || this.backend.readMode === "fail") {
      return null;
    }
    if (this.backend.readMode === "throw") {
      throw new Error("read failed");
    }
    return {
      data: Buffer.alloc(4, this.reads & 0xff),
      width: config.width,
      height: config.height,
      encoding: "rgb24",
    };
  }

  async release(): Promise<void> {
    this.open = false;
    this.backend.log.push(`release:${this.devicePath}`);
  }
}

export class FakeBackend implements DeviceBackend {
  readonly name = "fake";

  devices: CameraDevice[] = [{ name: "Test Camera", path: TEST_DEVICE }];
  formats: CaptureFormat[] = TEST_FORMATS;
  controls: RawControlEntry[] = testControls();
  readMode: ReadMode = "frames";
  /** Keeps a running production loop from starving the event loop */
  readDelayMs = 5;
  failOpen = false;
  rejectControls = new Set<string>();
  rejectConfigure: ((config: DeviceConfiguration) => boolean) | null = null;

  readonly applied: Array<[string, number]> = [];
  readonly handles: FakeHandle[] = [];
  readonly log: string[] = [];
  private readonly values = new Map<string, number>();

  async listDevices(): Promise<CameraDevice[]> {
    return this.devices.map((d) => ({ ...d }));
  }

  async listFormats(_devicePath: string): Promise<CaptureFormat[]> {
    return this.formats.map((f) => ({ ...f }));
  }

  async listControls(_devicePath: string): Promise<RawControlEntry[]> {
    return this.controls.map((entry) => {
      const value = this.values.get(entry.name);
      return {
        ...entry,
        fields: value === undefined ? { ...entry.fields } : { ...entry.fields, value },
      };
    });
  }

  async applyControl(_devicePath: string, name: string, value: number): Promise<ControlApplyOutcome> {
    this.log.push(`control:${name}=${value}`);
    this.applied.push([name, value]);
    if (this.rejectControls.has(name)) {
      return { success: false, error: "rejected" };
    }
    this.values.set(name, value);
    return { success: true };
  }

  async open(devicePath: string): Promise<DeviceHandle> {
    this.log.push(`open:${devicePath}`);
    if (this.failOpen || !this.devices.some((d) => d.path === devicePath)) {
      throw new Error("no such device");
    }
    const handle = new FakeHandle(devicePath, this);
    this.handles.push(handle);
    return handle;
  }

  lastHandle(): FakeHandle {
    const handle = this.handles[this.handles.length - 1];
    if (!handle) {
      throw new Error("No handle opened");
    }
    return handle;
  }
}

/**
 * Session on the fake backend with the production loop left off, so suites
 * drive reads and publishes themselves
 */
export function openTestSession(
  backend: FakeBackend,
  overrides: Partial<DeviceSessionOptions> = {},
): Promise<DeviceSession> {
  return DeviceSession.open({
    devicePath: TEST_DEVICE,
    backend,
    hub: new FrameHub({ failedReadBackoffMs: 1 }),
    reopenSettleMs: 0,
    startProducer: false,
    ...overrides,
  });
}

// ============================================================================
// Encoder and writer
// ============================================================================

export class FakeEncoder implements FrameEncoder {
  delayMs = 0;
  failNext = 0;
  readonly calls: Array<{ sequence: number; quality: number }> = [];

  async toJpeg(frame: Frame, quality: number): Promise<Buffer> {
    this.calls.push({ sequence: frame.sequence, quality });
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error("encode failed");
    }
    return Buffer.from(`jpeg:${frame.sequence}:${quality}`);
  }
}

export class FakeWriter implements VideoWriter {
  readonly width: number;
  readonly height: number;
  readonly written: number[] = [];
  failNext = 0;
  /** While set, every write waits for it */
  gate: Promise<void> | null = null;
  closed = false;

  constructor(readonly options: VideoWriterOptions) {
    this.width = options.width;
    this.height = options.height;
  }

  async write(frame: Frame): Promise<void> {
    if (this.gate) {
      await this.gate;
    }
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error("write failed");
    }
    this.written.push(frame.sequence);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeWriterFactory {
  failOpen = false;
  readonly writers: FakeWriter[] = [];

  readonly create: VideoWriterFactory = async (options) => {
    if (this.failOpen) {
      throw new Error("ffmpeg not found");
    }
    const writer = new FakeWriter(options);
    this.writers.push(writer);
    return writer;
  };

  last(): FakeWriter {
    const writer = this.writers[this.writers.length - 1];
    if (!writer) {
      throw new Error("No writer opened");
    }
    return writer;
  }
}
