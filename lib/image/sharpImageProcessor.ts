/**
 * Image operations backed by sharp: OCR scaling, grayscale enhancement,
 * PNG encoding.
 */

import sharp from "sharp";
import type { Frame } from "@/lib/ocr/types";

export interface ImageProcessor {
  /** Resize by a factor using cubic interpolation. A factor of 1 returns the frame as-is. */
  scale(frame: Frame, factor: number): Promise<Frame>;
  /** Single-channel frame with local contrast boost and light blur, for OCR and column detection. */
  toOcrGray(frame: Frame): Promise<Frame>;
  encodePng(frame: Frame): Promise<Buffer>;
}

function fromRaw(frame: Frame): sharp.Sharp {
  return sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: frame.channels },
  });
}

async function toFrame(pipeline: sharp.Sharp): Promise<Frame> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  const { channels } = info;
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new Error(`Unsupported channel count from sharp: ${channels}`);
  }
  return { data, width: info.width, height: info.height, channels };
}

export class SharpImageProcessor implements ImageProcessor {
  async scale(frame: Frame, factor: number): Promise<Frame> {
    if (!factor || factor === 1) return frame;
    const width = Math.max(1, Math.round(frame.width * factor));
    const height = Math.max(1, Math.round(frame.height * factor));
    return toFrame(fromRaw(frame).resize(width, height, { kernel: "cubic", fit: "fill" }));
  }

  async toOcrGray(frame: Frame): Promise<Frame> {
    return toFrame(
      // greyscale() runs before CLAHE in sharp's pipeline; b-w keeps one output channel
      fromRaw(frame)
        .greyscale()
        .clahe({ width: 8, height: 8, maxSlope: 2 })
        .blur(0.8)
        .toColourspace("b-w")
    );
  }

  async encodePng(frame: Frame): Promise<Buffer> {
    return fromRaw(frame).png().toBuffer();
  }
}
