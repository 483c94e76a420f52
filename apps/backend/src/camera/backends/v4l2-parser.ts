/**
 * Parsers for v4l2-ctl listings
 */

import type { CameraDevice, CaptureFormat } from "@camstation/types";
import type { RawControlEntry, RawControlField } from "../types";

const VIDEO_NODE = /^\/dev\/video(\d+)$/;

// "brightness 0x00980900 (int)    : min=-64 max=64 step=1 default=0 value=0"
const CONTROL_LINE =
  /^\s*([A-Za-z0-9_]+)(?:\s+0x[0-9a-fA-F]+)?\s+\(([a-z0-9]+)\)\s*:\s*(.*)$/;
const CONTROL_FIELD = /\b(min|max|step|default|value)=(-?\d+)/g;

// "[0]: 'MJPG' (Motion-JPEG, compressed)"
const FORMAT_LINE = /^\[\d+\]:\s+'(\w+)'/;
// "Size: Discrete 1280x720"
const SIZE_LINE = /Size:\s+Discrete\s+(\d+)x(\d+)/;

/**
 * Numeric index of a /dev/videoN path, 0 when the path has none
 */
export function videoDeviceIndex(devicePath: string): number {
  const match = devicePath.match(/\/dev\/video(\d+)/);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Parse `v4l2-ctl --list-devices`. Each device block contributes its first
 * /dev/videoN node; the result is sorted by that node's index.
 */
export function parseDeviceList(output: string): CameraDevice[] {
  const devices: CameraDevice[] = [];
  let currentName: string | null = null;
  let taken = false;

  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }

    if (!/^\s/.test(line)) {
      currentName = line.trim().replace(/:$/, "");
      taken = false;
      continue;
    }

    const node = line.trim();
    if (currentName !== null && !taken && VIDEO_NODE.test(node)) {
      devices.push({ name: currentName, path: node });
      taken = true;
    }
  }

  return devices.sort((a, b) => videoDeviceIndex(a.path) - videoDeviceIndex(b.path));
}

/**
 * Parse `v4l2-ctl --list-formats-ext` into (format, width, height) triples
 * in listing order
 */
export function parseFormatList(output: string): CaptureFormat[] {
  const formats: CaptureFormat[] = [];
  let format: string | null = null;

  for (const raw of output.split(/\r?\n/)) {
    const line = raw.trim();
    const formatMatch = line.match(FORMAT_LINE);
    if (formatMatch) {
      format = formatMatch[1];
      continue;
    }
    const sizeMatch = line.match(SIZE_LINE);
    if (sizeMatch && format) {
      formats.push({
        format,
        width: parseInt(sizeMatch[1], 10),
        height: parseInt(sizeMatch[2], 10),
      });
    }
  }

  return formats;
}

function isControlField(name: string): name is RawControlField {
  return (
    name === "min" ||
    name === "max" ||
    name === "step" ||
    name === "default" ||
    name === "value"
  );
}

/**
 * Parse one `--list-ctrls` line, or null for headers and blank lines
 */
export function parseControlLine(line: string): RawControlEntry | null {
  const match = line.match(CONTROL_LINE);
  if (!match) {
    return null;
  }

  const [, name, type, rest] = match;
  const fields: RawControlEntry["fields"] = {};
  for (const field of rest.matchAll(CONTROL_FIELD)) {
    const key = field[1];
    if (isControlField(key)) {
      fields[key] = parseInt(field[2], 10);
    }
  }

  return { name, type, fields };
}

/**
 * Parse `v4l2-ctl --list-ctrls`. Entries are returned unclassified.
 */
export function parseControlList(output: string): RawControlEntry[] {
  const entries: RawControlEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const entry = parseControlLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}
