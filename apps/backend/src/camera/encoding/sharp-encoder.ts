import sharp from "sharp";
import type { Frame, FrameEncoder } from "../types";

// Preview, timelapse and photo encodes share the libuv pool with file I/O
sharp.concurrency(2);

/**
 * JPEG encoder backed by sharp. Packed RGB frames are described to sharp as
 * raw 3-channel input; JPEG frames are decoded and re-encoded at the
 * requested quality.
 */
export class SharpFrameEncoder implements FrameEncoder {
  async toJpeg(frame: Frame, quality: number): Promise<Buffer> {
    const image =
      frame.encoding === "rgb24"
        ? sharp(frame.data, {
            raw: { width: frame.width, height: frame.height, channels: 3 },
          })
        : sharp(frame.data);

    return image.jpeg({ quality }).toBuffer();
  }
}
