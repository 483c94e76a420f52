/**
 * Control Registry
 *
 * Holds the classified hardware controls of one device session together with
 * the two defaults maps that survive reinitialization:
 * - originalHardwareDefaults: captured from the first listing, never changed
 * - storedDefaults: calculated working defaults, computed once
 */

import type {
  ApplyDefaultsReport,
  ControlDescriptor,
  ControlValues,
} from "@camstation/types";
import { cameraLogger } from "./logger";
import { ControlOutOfRangeError, UnknownControlError, toError } from "./errors";
import type { ControlApplyOutcome, RawControlEntry } from "./types";

export const EXPOSURE_MODE_CONTROLS = ["auto_exposure", "exposure_auto"] as const;
export const EXPOSURE_TIME_CONTROLS = [
  "exposure_time_absolute",
  "exposure_absolute",
] as const;

/** Menu value that selects manual exposure on UVC cameras */
const MANUAL_EXPOSURE_MODE = 1;

export interface ControlSource {
  listControls(): Promise<RawControlEntry[]>;
  applyControl(name: string, value: number): Promise<ControlApplyOutcome>;
}

/**
 * Turn a raw control entry into a descriptor, or null when its kind is not
 * supported or a required numeric field is missing
 */
export function classifyControl(entry: RawControlEntry): ControlDescriptor | null {
  const { min, max, step, value } = entry.fields;
  const def = entry.fields.default;
  if (def === undefined || value === undefined) {
    return null;
  }

  switch (entry.type) {
    case "int":
      if (min === undefined || max === undefined || step === undefined) {
        return null;
      }
      return { name: entry.name, kind: "int", min, max, step, default: def, current: value };

    case "bool":
      return { name: entry.name, kind: "bool", min: 0, max: 1, step: 1, default: def, current: value };

    case "menu":
      if (min === undefined || max === undefined) {
        return null;
      }
      return { name: entry.name, kind: "menu", min, max, step: 1, default: def, current: value };

    default:
      return null;
  }
}

function findFirst(names: readonly string[], values: ControlValues): string | undefined {
  return names.find((name) => name in values);
}

export class ControlRegistry {
  private descriptors = new Map<string, ControlDescriptor>();
  private originalHardwareDefaults: ControlValues | null = null;
  private storedDefaults: ControlValues | null = null;

  constructor(private readonly source: ControlSource) {}

  /**
   * Query the device, classify its controls and swap them in.
   * The first successful listing also captures the hardware defaults.
   */
  async listControls(): Promise<ControlDescriptor[]> {
    const entries = await this.source.listControls();
    const next = new Map<string, ControlDescriptor>();

    for (const entry of entries) {
      const descriptor = classifyControl(entry);
      if (descriptor) {
        next.set(descriptor.name, descriptor);
      } else {
        cameraLogger.debug("ControlRegistry: Skipping control", {
          name: entry.name,
          type: entry.type,
        });
      }
    }

    this.descriptors = next;

    if (!this.originalHardwareDefaults && next.size > 0) {
      const originals: ControlValues = {};
      for (const descriptor of next.values()) {
        originals[descriptor.name] = descriptor.default;
      }
      this.originalHardwareDefaults = originals;
      cameraLogger.info(
        `ControlRegistry: Captured hardware defaults for ${next.size} controls`,
      );
    }

    return this.list();
  }

  /**
   * Working defaults derived from each control's range
   */
  calculateDefaults(): ControlValues {
    const defaults: ControlValues = {};
    for (const control of this.descriptors.values()) {
      switch (control.kind) {
        case "int":
          defaults[control.name] = Math.floor((control.min + control.max) / 2);
          break;
        case "bool":
          defaults[control.name] = control.min;
          break;
        case "menu":
          defaults[control.name] =
            EXPOSURE_MODE_CONTROLS.some((name) => name === control.name) &&
            control.max >= MANUAL_EXPOSURE_MODE
              ? MANUAL_EXPOSURE_MODE
              : control.min;
          break;
      }
    }
    return defaults;
  }

  /**
   * Write the calculated defaults to the device.
   *
   * Exposure time is only honoured by the hardware in manual exposure mode,
   * so it is written after the mode control and only when that write took.
   * Failures are collected, never fatal.
   */
  async applyDefaults(): Promise<ApplyDefaultsReport> {
    const defaults = this.calculateDefaults();
    if (!this.storedDefaults) {
      this.storedDefaults = { ...defaults };
    }
    const stored = this.storedDefaults;

    const modeControl = findFirst(EXPOSURE_MODE_CONTROLS, defaults);
    const timeControl = findFirst(EXPOSURE_TIME_CONTROLS, defaults);
    const failed: string[] = [];

    for (const [name, value] of Object.entries(defaults)) {
      if (name === modeControl) continue;
      if (name === timeControl && modeControl !== undefined) continue;
      if (!(await this.write(name, value))) {
        failed.push(name);
      }
    }

    if (modeControl !== undefined) {
      const modeValue = defaults[modeControl];
      if (await this.write(modeControl, modeValue)) {
        stored[modeControl] = modeValue;
        if (timeControl !== undefined && !(await this.write(timeControl, defaults[timeControl]))) {
          failed.push(timeControl);
        }
      } else {
        failed.push(modeControl);
        if (timeControl !== undefined) {
          failed.push(timeControl);
        }
      }
    }

    for (const [name, calculated] of Object.entries(defaults)) {
      const descriptor = this.descriptors.get(name);
      if (descriptor) {
        this.descriptors.set(name, { ...descriptor, default: stored[name] ?? calculated });
      }
    }

    const total = Object.keys(defaults).length;
    const report: ApplyDefaultsReport = { applied: total - failed.length, failed, total };
    cameraLogger.info(
      `ControlRegistry: Applied defaults to ${report.applied} of ${report.total} controls`,
      failed.length > 0 ? { failed } : undefined,
    );
    return report;
  }

  /**
   * Reject unknown controls and values the device would not accept
   */
  validate(name: string, value: number): ControlDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownControlError(name);
    }
    if (!Number.isInteger(value) || value < descriptor.min || value > descriptor.max) {
      throw new ControlOutOfRangeError(name, value, descriptor.min, descriptor.max);
    }
    return descriptor;
  }

  /**
   * Record a value the device accepted
   */
  recordValue(name: string, value: number): void {
    const descriptor = this.descriptors.get(name);
    if (descriptor) {
      this.descriptors.set(name, { ...descriptor, current: value });
    }
  }

  get(name: string): ControlDescriptor | undefined {
    return this.descriptors.get(name);
  }

  list(): ControlDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  size(): number {
    return this.descriptors.size;
  }

  getAllCurrentValues(): ControlValues {
    const values: ControlValues = {};
    for (const descriptor of this.descriptors.values()) {
      values[descriptor.name] = descriptor.current;
    }
    return values;
  }

  getStoredDefaults(): ControlValues {
    return { ...this.storedDefaults };
  }

  getOriginalHardwareDefaults(): ControlValues {
    return { ...this.originalHardwareDefaults };
  }

  private async write(name: string, value: number): Promise<boolean> {
    try {
      const outcome = await this.source.applyControl(name, value);
      if (outcome.success) {
        this.recordValue(name, value);
        return true;
      }
      cameraLogger.warn(`ControlRegistry: Failed to set ${name}=${value}`, {
        error: outcome.error,
      });
      return false;
    } catch (error) {
      cameraLogger.warn(`ControlRegistry: Failed to set ${name}=${value}`, {
        error: toError(error).message,
      });
      return false;
    }
  }
}
