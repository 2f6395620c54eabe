/**
 * Word → line grouping.
 *
 * Tesseract already tells us which line each word belongs to through its
 * (page, block, paragraph, line) indices, so grouping is structural rather
 * than geometric. Geometry is only used for the resulting line box and for
 * ordering lines top-to-bottom, left-to-right.
 */

import type { Line, Rect, Word } from "./types";

type LineGroup = {
  key: [number, number, number, number];
  words: Word[];
};

/**
 * Median of a list of numbers (mean of the two middle values for even counts).
 * Returns 0 for an empty list.
 */
export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Smallest rectangle covering every box, width/height floored at 1.
 */
export function unionRect(boxes: Rect[]): Rect {
  const x0 = Math.min(...boxes.map((b) => b.x));
  const y0 = Math.min(...boxes.map((b) => b.y));
  const x1 = Math.max(...boxes.map((b) => b.x + b.w));
  const y1 = Math.max(...boxes.map((b) => b.y + b.h));
  return { x: x0, y: y0, w: Math.max(1, x1 - x0), h: Math.max(1, y1 - y0) };
}

function keepWord(word: Word, minConfidence: number): boolean {
  if (!word.text.trim()) return false;
  // -1 means "unknown", never a reason to drop
  if (word.confidence >= 0 && word.confidence < minConfidence) return false;
  return true;
}

function compareKeys(a: LineGroup["key"], b: LineGroup["key"]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

/**
 * Group OCR words into ordered text lines.
 *
 * @param words - Words from a single OCR call
 * @param minConfidence - Words with a known confidence below this are dropped
 * @returns Lines sorted by (y, x); zero words yields zero lines
 */
export function groupWordsIntoLines(words: Word[], minConfidence = 0): Line[] {
  const groups = new Map<string, LineGroup>();

  for (const word of words) {
    if (!keepWord(word, minConfidence)) continue;
    const key: LineGroup["key"] = [word.page, word.block, word.paragraph, word.lineIndex];
    const id = key.join(":");
    const group = groups.get(id);
    if (group) {
      group.words.push(word);
    } else {
      groups.set(id, { key, words: [word] });
    }
  }

  const lines: Array<Line & { key: LineGroup["key"] }> = [];
  for (const group of groups.values()) {
    const ordered = [...group.words].sort((a, b) => a.wordIndex - b.wordIndex);
    const confidences = ordered.map((w) => w.confidence).filter((c) => c >= 0);
    lines.push({
      key: group.key,
      text: ordered.map((w) => w.text.trim()).join(" "),
      confidence: median(confidences),
      box: unionRect(ordered.map((w) => w.box)),
    });
  }

  // Ties on (y, x) fall back to the structural key so the order does not
  // depend on the order words arrived in.
  lines.sort((a, b) => a.box.y - b.box.y || a.box.x - b.box.x || compareKeys(a.key, b.key));

  return lines.map(({ text, confidence, box }) => ({ text, confidence, box }));
}
