/**
 * v4l2-ctl Listing Parser Tests
 *
 * Source: apps/backend/src/camera/backends/v4l2-parser.ts
 *
 * Critical Invariants:
 * - Each device block contributes its first /dev/videoN node
 * - Devices are sorted by node index, not listing order
 * - Control lines are parsed with or without the hex id; menu items and
 *   class headers are ignored
 */

import { describe, it, expect } from "vitest";
import {
  parseControlLine,
  parseControlList,
  parseDeviceList,
  parseFormatList,
  videoDeviceIndex,
} from "../backends/v4l2-parser";

const DEVICE_LISTING = [
  "USB Camera: USB Camera (usb-0000:00:14.0-1):",
  "\t/dev/video2",
  "\t/dev/video3",
  "\t/dev/media1",
  "",
  "Integrated Webcam (usb-0000:00:14.0-5):",
  "\t/dev/video0",
  "\t/dev/video1",
  "",
].join("\n");

const FORMAT_LISTING = [
  "ioctl: VIDIOC_ENUM_FMT",
  "\tType: Video Capture",
  "",
  "\t[0]: 'MJPG' (Motion-JPEG, compressed)",
  "\t\tSize: Discrete 1280x720",
  "\t\t\tInterval: Discrete 0.033s (30.000 fps)",
  "\t\tSize: Discrete 640x480",
  "\t\t\tInterval: Discrete 0.033s (30.000 fps)",
  "\t[1]: 'YUYV' (YUYV 4:2:2)",
  "\t\tSize: Discrete 640x480",
  "\t\t\tInterval: Discrete 0.033s (30.000 fps)",
].join("\n");

const CONTROL_LISTING = [
  "",
  "User Controls",
  "",
  "                     brightness 0x00980900 (int)    : min=-64 max=64 step=1 default=0 value=-10",
  "        white_balance_automatic 0x0098090c (bool)   : default=1 value=1",
  "           power_line_frequency 0x00980918 (menu)   : min=0 max=2 default=1 value=1 (50 Hz)",
  "\t\t\t\t0: Disabled",
  "\t\t\t\t1: 50 Hz",
  "",
  "Camera Controls",
  "",
  "                  auto_exposure 0x009a0901 (menu)   : min=0 max=3 default=3 value=3 (Aperture Priority Mode)",
  "         exposure_time_absolute 0x009a0902 (int)    : min=3 max=2047 step=1 default=250 value=250 flags=inactive",
].join("\n");

describe("videoDeviceIndex()", () => {
  it("reads the node number", () => {
    expect(videoDeviceIndex("/dev/video12")).toBe(12);
    expect(videoDeviceIndex("/dev/media0")).toBe(0);
  });
});

describe("parseDeviceList()", () => {
  it("takes the first video node of each device, sorted by index", () => {
    expect(parseDeviceList(DEVICE_LISTING)).toEqual([
      { name: "Integrated Webcam (usb-0000:00:14.0-5)", path: "/dev/video0" },
      { name: "USB Camera: USB Camera (usb-0000:00:14.0-1)", path: "/dev/video2" },
    ]);
  });

  it("skips devices without a video node", () => {
    expect(parseDeviceList("Audio Bridge (platform):\n\t/dev/media3\n")).toEqual([]);
  });
});

describe("parseFormatList()", () => {
  it("pairs every discrete size with its pixel format", () => {
    expect(parseFormatList(FORMAT_LISTING)).toEqual([
      { format: "MJPG", width: 1280, height: 720 },
      { format: "MJPG", width: 640, height: 480 },
      { format: "YUYV", width: 640, height: 480 },
    ]);
  });

  it("returns nothing for an empty listing", () => {
    expect(parseFormatList("ioctl: VIDIOC_ENUM_FMT\n\tType: Video Capture\n")).toEqual([]);
  });
});

describe("parseControlLine()", () => {
  it("parses a line without the hex id", () => {
    expect(parseControlLine("contrast (int) : min=0 max=100 step=1 default=32 value=40")).toEqual({
      name: "contrast",
      type: "int",
      fields: { min: 0, max: 100, step: 1, default: 32, value: 40 },
    });
  });

  it("ignores headers and menu items", () => {
    expect(parseControlLine("User Controls")).toBeNull();
    expect(parseControlLine("\t\t\t\t0: Disabled")).toBeNull();
  });
});

describe("parseControlList()", () => {
  it("returns every control in listing order", () => {
    expect(parseControlList(CONTROL_LISTING)).toEqual([
      { name: "brightness", type: "int", fields: { min: -64, max: 64, step: 1, default: 0, value: -10 } },
      { name: "white_balance_automatic", type: "bool", fields: { default: 1, value: 1 } },
      { name: "power_line_frequency", type: "menu", fields: { min: 0, max: 2, default: 1, value: 1 } },
      { name: "auto_exposure", type: "menu", fields: { min: 0, max: 3, default: 3, value: 3 } },
      {
        name: "exposure_time_absolute",
        type: "int",
        fields: { min: 3, max: 2047, step: 1, default: 250, value: 250 },
      },
    ]);
  });
});
