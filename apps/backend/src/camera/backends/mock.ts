/**
 * Mock device backend
 * Simulates a UVC camera for development and testing.
 * Supports failure simulation modes via MOCK_FAILURE_MODE env var.
 */

import type { CameraDevice, CaptureFormat } from "@camstation/types";
import { sleep } from "@camstation/utils";
import { cameraLogger } from "../logger";
import { DeviceUnavailableError } from "../errors";
import type {
  ControlApplyOutcome,
  DeviceBackend,
  DeviceConfiguration,
  DeviceHandle,
  RawControlEntry,
  RawFrame,
} from "../types";
import type { MockFailureMode } from "../../config/env";

const MOCK_DEVICES: CameraDevice[] = [{ name: "Mock UVC Camera", path: "/dev/video0" }];

const MOCK_FORMATS: CaptureFormat[] = [
  { format: "YUYV", width: 1280, height: 720 },
  { format: "YUYV", width: 640, height: 480 },
  { format: "YUYV", width: 320, height: 240 },
];

function mockControls(): RawControlEntry[] {
  return [
    { name: "brightness", type: "int", fields: { min: -64, max: 64, step: 1, default: 0, value: 0 } },
    { name: "contrast", type: "int", fields: { min: 0, max: 100, step: 1, default: 32, value: 32 } },
    // Reported default lies outside its own range, as some firmware does
    { name: "gain", type: "int", fields: { min: 0, max: 100, step: 1, default: 255, value: 0 } },
    { name: "white_balance_automatic", type: "bool", fields: { default: 1, value: 1 } },
    { name: "power_line_frequency", type: "menu", fields: { min: 0, max: 2, default: 1, value: 1 } },
    { name: "auto_exposure", type: "menu", fields: { min: 0, max: 3, default: 3, value: 3 } },
    {
      name: "exposure_time_absolute",
      type: "int",
      fields: { min: 1, max: 5000, step: 1, default: 157, value: 157 },
    },
  ];
}

export interface MockBackendOptions {
  failureMode?: MockFailureMode;
  /** Overrides the pacing derived from the configured fps */
  frameIntervalMs?: number;
}

class MockDeviceHandle implements DeviceHandle {
  private open = true;
  private config: DeviceConfiguration | null = null;
  private nextFrameAt = 0;
  private reads = 0;
  private tick = 0;

  constructor(
    readonly devicePath: string,
    private readonly failureMode: MockFailureMode,
    private readonly frameIntervalMs: number | undefined,
  ) {}

  isOpen(): boolean {
    return this.open;
  }

  async configure(config: DeviceConfiguration): Promise<void> {
    if (!this.open) {
      throw new Error("Mock device is released");
    }
    const supported = MOCK_FORMATS.some(
      (f) => f.format === config.format && f.width === config.width && f.height === config.height,
    );
    if (!supported) {
      throw new Error(`Unsupported mode ${config.width}x${config.height} (${config.format})`);
    }
    this.config = config;
    this.nextFrameAt = Date.now();
  }

  async read(timeoutMs: number): Promise<RawFrame | null> {
    const config = this.config;
    if (!this.open || !config) {
      return null;
    }
    this.reads += 1;

    if (this.failureMode === "read_stall") {
      await sleep(timeoutMs);
      return null;
    }
    if (this.failureMode === "flaky_reads" && this.reads % 3 === 0) {
      throw new Error("Simulated read failure");
    }

    const interval = this.frameIntervalMs ?? 1000 / config.fps;
    const wait = Math.max(0, this.nextFrameAt - Date.now());
    if (wait > timeoutMs) {
      await sleep(timeoutMs);
      return null;
    }
    await sleep(wait);
    this.nextFrameAt = Math.max(this.nextFrameAt, Date.now()) + interval;

    return {
      data: this.renderFrame(config.width, config.height),
      width: config.width,
      height: config.height,
      encoding: "rgb24",
    };
  }

  async release(): Promise<void> {
    this.open = false;
    this.config = null;
  }

  /**
   * Horizontal bands that scroll one row per frame
   */
  private renderFrame(width: number, height: number): Buffer {
    const rowBytes = width * 3;
    const data = Buffer.alloc(rowBytes * height);
    this.tick = (this.tick + 1) % 256;
    for (let y = 0; y < height; y++) {
      data.fill((y + this.tick) & 0xff, y * rowBytes, (y + 1) * rowBytes);
    }
    return data;
  }
}

export class MockBackend implements DeviceBackend {
  readonly name = "mock";
  private readonly failureMode: MockFailureMode;
  private readonly frameIntervalMs: number | undefined;
  /** Control values survive reopening, like real hardware */
  private readonly controlValues = new Map<string, Map<string, number>>();

  constructor(options: MockBackendOptions = {}) {
    this.failureMode = options.failureMode ?? "none";
    this.frameIntervalMs = options.frameIntervalMs;
    cameraLogger.info(`MockBackend: Initialized with failure mode: ${this.failureMode}`);
  }

  async listDevices(): Promise<CameraDevice[]> {
    return MOCK_DEVICES.map((d) => ({ ...d }));
  }

  async listFormats(devicePath: string): Promise<CaptureFormat[]> {
    this.assertKnown(devicePath);
    return MOCK_FORMATS.map((f) => ({ ...f }));
  }

  async listControls(devicePath: string): Promise<RawControlEntry[]> {
    this.assertKnown(devicePath);
    const values = this.valuesFor(devicePath);
    return mockControls().map((entry) => {
      const value = values.get(entry.name);
      return value === undefined ? entry : { ...entry, fields: { ...entry.fields, value } };
    });
  }

  async applyControl(devicePath: string, name: string, value: number): Promise<ControlApplyOutcome> {
    if (this.failureMode === "control_reject") {
      return { success: false, error: `VIDIOC_S_EXT_CTRLS: failed: Input/output error (${name})` };
    }
    const entry = mockControls().find((c) => c.name === name);
    if (!entry) {
      return { success: false, error: `unknown control '${name}'` };
    }
    this.valuesFor(devicePath).set(name, value);
    return { success: true };
  }

  async open(devicePath: string): Promise<DeviceHandle> {
    if (this.failureMode === "unavailable") {
      throw new DeviceUnavailableError(devicePath, "Simulated device unavailable");
    }
    this.assertKnown(devicePath);
    return new MockDeviceHandle(devicePath, this.failureMode, this.frameIntervalMs);
  }

  private assertKnown(devicePath: string): void {
    if (!MOCK_DEVICES.some((d) => d.path === devicePath)) {
      throw new DeviceUnavailableError(devicePath, "No such mock device");
    }
  }

  private valuesFor(devicePath: string): Map<string, number> {
    let values = this.controlValues.get(devicePath);
    if (!values) {
      values = new Map();
      this.controlValues.set(devicePath, values);
    }
    return values;
  }
}
