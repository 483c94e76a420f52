import type { CaptureFormat } from "@camstation/types";
import type { FrameEncoding } from "./types";

/**
 * Frame encoding a capture format is delivered in
 */
export function frameEncodingFor(format: string): FrameEncoding {
  const tag = format.toUpperCase();
  return tag === "MJPG" || tag === "JPEG" ? "jpeg" : "rgb24";
}

/**
 * Formats ordered by (width, height) ascending
 */
export function sortFormats(formats: CaptureFormat[]): CaptureFormat[] {
  return [...formats].sort((a, b) => a.width - b.width || a.height - b.height);
}

export function sameFormat(a: CaptureFormat, b: CaptureFormat): boolean {
  return a.format === b.format && a.width === b.width && a.height === b.height;
}
