/**
 * Horizontal tightening of an entry box to the columns that contain text.
 *
 * Entry boxes span the full capture width, which often includes UI chrome
 * (scroll bars, borders, icons) on either side. Cropping to the ink columns
 * before the second OCR pass keeps that noise out of the entry text.
 */

import type { Frame, Rect } from "@/lib/ocr/types";

// Horizontal dilation width; joins glyphs and words into continuous runs
const DILATE_KERNEL_WIDTH = 11;

/**
 * Otsu's threshold over a 256-bin histogram.
 * Returns the gray level that maximizes between-class variance.
 */
export function otsuThreshold(histogram: number[], total: number): number {
  let sumAll = 0;
  for (let i = 0; i < 256; i++) sumAll += i * histogram[i];

  let sumBackground = 0;
  let weightBackground = 0;
  let bestVariance = -1;
  let threshold = 0;

  for (let t = 0; t < 256; t++) {
    weightBackground += histogram[t];
    if (weightBackground === 0) continue;
    const weightForeground = total - weightBackground;
    if (weightForeground === 0) break;

    sumBackground += t * histogram[t];
    const meanBackground = sumBackground / weightBackground;
    const meanForeground = (sumAll - sumBackground) / weightForeground;
    const between = weightBackground * weightForeground * (meanBackground - meanForeground) ** 2;
    if (between > bestVariance) {
      bestVariance = between;
      threshold = t;
    }
  }

  return threshold;
}

/**
 * Narrow a box to the outermost columns holding bright pixels.
 *
 * @param gray - Single-channel frame (light text on a dark log background)
 * @param box - Region to tighten, in frame coordinates
 * @param padLR - Columns kept on each side of the detected ink
 * @returns The tightened box; the input box if the slice is empty or has no ink
 */
export function tightenToTextColumns(gray: Frame, box: Rect, padLR: number): Rect {
  if (gray.channels !== 1) {
    throw new Error(`tightenToTextColumns expects a grayscale frame, got ${gray.channels} channels`);
  }

  const x0 = Math.max(0, box.x);
  const y0 = Math.max(0, box.y);
  const x1 = Math.min(gray.width, box.x + box.w);
  const y1 = Math.min(gray.height, box.y + box.h);
  const sliceW = x1 - x0;
  const sliceH = y1 - y0;
  if (sliceW <= 0 || sliceH <= 0) return box;

  const histogram = new Array<number>(256).fill(0);
  for (let y = y0; y < y1; y++) {
    const row = y * gray.width;
    for (let x = x0; x < x1; x++) histogram[gray.data[row + x]]++;
  }
  const threshold = otsuThreshold(histogram, sliceW * sliceH);

  const inkColumns = new Array<boolean>(sliceW).fill(false);
  for (let y = y0; y < y1; y++) {
    const row = y * gray.width;
    for (let x = x0; x < x1; x++) {
      if (gray.data[row + x] > threshold) inkColumns[x - x0] = true;
    }
  }

  // Column-wise dilation is enough: only the horizontal extent matters here
  const half = Math.floor(DILATE_KERNEL_WIDTH / 2);
  let first = -1;
  let last = -1;
  for (let c = 0; c < sliceW; c++) {
    if (!inkColumns[c]) continue;
    const lo = Math.max(0, c - half);
    const hi = Math.min(sliceW - 1, c + half);
    if (first === -1 || lo < first) first = lo;
    if (hi > last) last = hi;
  }
  if (first === -1) return box;

  const left = Math.max(0, first - padLR);
  const right = Math.min(sliceW, last + 1 + padLR);
  return { x: x0 + left, y: box.y, w: Math.max(1, right - left), h: box.h };
}
