/**
 * Entry segmentation.
 *
 * A game log view is a vertical list of records, each starting with a
 * timestamp header ("Day 123, 04:05:06:"). Given the OCR lines of one
 * frame, this module finds the header lines and turns each into a
 * vertical slice of the frame that covers the header and its body.
 */

import type { Line, Rect } from "@/lib/ocr/types";

export const DEFAULT_ENTRY_HEADER_PATTERN =
  String.raw`(?i)\bday\s*\d{1,6}\s*,\s*\d{1,2}[:;]\d{2}[:;]\d{2}\s*[:;]?`;

// Used when a configured header pattern does not compile
const FALLBACK_HEADER_PATTERN = /\bday\b/i;

export interface Entry {
  box: Rect;
  headerText: string;
  headerBox: Rect;
}

export type SegmentOptions = {
  frameWidth: number;
  frameHeight: number;
  headerPattern: RegExp;
  padLR: number;
  padV: number;
  maxHeight: number;
};

/**
 * Compile a user-supplied pattern.
 *
 * Config files carry patterns written for engines that accept an inline
 * "(?i)" prefix; JavaScript does not, so a leading "(?i)" becomes the i flag.
 * Throws SyntaxError for malformed patterns.
 */
export function compilePattern(source: string, forceIgnoreCase = false): RegExp {
  let body = source;
  let ignoreCase = forceIgnoreCase;
  if (body.startsWith("(?i)")) {
    body = body.slice(4);
    ignoreCase = true;
  }
  return new RegExp(body, ignoreCase ? "i" : "");
}

/**
 * Compile the entry header pattern, falling back to a bare "day" matcher
 * when the configured one is malformed.
 */
export function compileHeaderPattern(source?: string | null): RegExp {
  const pattern = source && source.trim() ? source : DEFAULT_ENTRY_HEADER_PATTERN;
  try {
    return compilePattern(pattern);
  } catch (error) {
    console.warn(`[Entries] Bad entry header regex '${pattern}', using fallback:`, error);
    return FALLBACK_HEADER_PATTERN;
  }
}

/**
 * Split ordered OCR lines into entries at header lines.
 *
 * Each entry runs from its header's top to the next header's top (or the
 * frame bottom), capped at maxHeight, padded vertically by padV and inset
 * horizontally by padLR. No headers means no entries.
 */
export function segmentEntries(lines: Line[], options: SegmentOptions): Entry[] {
  const { frameWidth, frameHeight, headerPattern, padLR, padV, maxHeight } = options;

  const ordered = [...lines].sort((a, b) => a.box.y - b.box.y || a.box.x - b.box.x);
  const headers = ordered.filter((line) => headerPattern.test(line.text));
  if (headers.length === 0) return [];

  const x0 = padLR;
  const x1 = Math.max(1, frameWidth - padLR);

  return headers.map((header, i) => {
    const hy = header.box.y;
    const nextY = i + 1 < headers.length ? headers[i + 1].box.y : frameHeight;
    const y0 = Math.max(0, hy - padV);
    const y1 = Math.min(frameHeight, Math.min(nextY, hy + maxHeight) + padV);
    return {
      box: { x: x0, y: y0, w: Math.max(1, x1 - x0), h: Math.max(1, y1 - y0) },
      headerText: header.text,
      headerBox: header.box,
    };
  });
}

/**
 * Keep only the topmost entry.
 *
 * Assumes the log view lists the newest record first; a view that scrolls
 * or sorts the other way would make this the oldest one.
 */
export function selectNewestEntry(entries: Entry[]): Entry[] {
  if (entries.length === 0) return [];
  const newest = entries.reduce((best, e) => (e.headerBox.y < best.headerBox.y ? e : best));
  return [newest];
}
