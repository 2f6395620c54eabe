/**
 * Screen capture.
 *
 * Grabs the screen with screenshot-desktop and cuts the watched rectangle
 * out with sharp. The rectangle is anchored at the top-left of the grabbed
 * image and clamped to it before cropping.
 *
 * Without a screen id, X11 grabs the whole virtual screen while Windows and
 * macOS grab the primary display only. On multi-monitor setups set
 * captureScreen and give captureRect relative to that display.
 */

import screenshot from "screenshot-desktop";
import sharp from "sharp";
import { clampRect } from "@/lib/image/frame";
import type { Frame, Rect } from "@/lib/ocr/types";

export interface ScreenCapture {
  /** RGB pixels of the (clamped) rectangle. */
  capture(rect: Rect): Promise<Frame>;
}

export class DesktopScreenCapture implements ScreenCapture {
  constructor(private readonly screenId?: string | number | null) {}

  async capture(rect: Rect): Promise<Frame> {
    const png = await screenshot({ format: "png", screen: this.screenId ?? undefined });
    const image = sharp(png);
    const { width, height } = await image.metadata();
    if (!width || !height) {
      throw new Error("Screenshot has no dimensions");
    }

    const region = clampRect(rect, width, height);
    const { data, info } = await image
      .extract({ left: region.x, top: region.y, width: region.w, height: region.h })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { data, width: info.width, height: info.height, channels: 3 };
  }
}
