import type { Frame, Rect } from "@/lib/ocr/types";

/**
 * Clamp a rectangle into a width x height image: origin inside the image,
 * size at least 1 and never past the right/bottom edge.
 */
export function clampRect(rect: Rect, width: number, height: number): Rect {
  const x = Math.max(0, Math.min(width - 1, Math.trunc(rect.x)));
  const y = Math.max(0, Math.min(height - 1, Math.trunc(rect.y)));
  const w = Math.max(1, Math.min(width - x, Math.trunc(rect.w)));
  const h = Math.max(1, Math.min(height - y, Math.trunc(rect.h)));
  return { x, y, w, h };
}

/**
 * Copy a rectangular region out of a frame. The rectangle is clamped first,
 * so the result always has at least one pixel.
 */
export function cropFrame(frame: Frame, rect: Rect): Frame {
  const { x, y, w, h } = clampRect(rect, frame.width, frame.height);
  const { channels } = frame;
  const rowBytes = w * channels;
  const data = Buffer.alloc(rowBytes * h);

  for (let row = 0; row < h; row++) {
    const start = ((y + row) * frame.width + x) * channels;
    frame.data.copy(data, row * rowBytes, start, start + rowBytes);
  }

  return { data, width: w, height: h, channels };
}
