import type { Word } from "./types";

// Tesseract TSV column order (header row is the first line)
const TSV_COLUMNS = [
  "level",
  "page_num",
  "block_num",
  "par_num",
  "line_num",
  "word_num",
  "left",
  "top",
  "width",
  "height",
  "conf",
  "text",
] as const;

const WORD_LEVEL = 5;

function toInt(value: string): number | null {
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? null : n;
}

/**
 * Tesseract reports confidence as a float ("96.352203") or -1.
 * Anything unparsable counts as unknown.
 */
export function parseConfidence(value: string | undefined): number {
  if (value == null) return -1;
  const n = Number.parseFloat(value);
  if (!Number.isFinite(n)) return -1;
  return Math.trunc(n);
}

/**
 * Parse Tesseract TSV output into word records.
 *
 * Only level-5 rows (words) are returned. Text is kept as reported;
 * empty-text filtering happens in the grouper so the confidence rules
 * live in one place.
 */
export function parseTesseractTsv(tsv: string): Word[] {
  const words: Word[] = [];
  const rows = tsv.split(/\r?\n/);

  for (const row of rows) {
    if (!row) continue;
    const cols = row.split("\t");
    if (cols.length < TSV_COLUMNS.length - 1) continue;

    const level = toInt(cols[0]);
    if (level !== WORD_LEVEL) continue; // also skips the header row

    const [page, block, paragraph, lineIndex, wordIndex, left, top, width, height] = cols
      .slice(1, 10)
      .map(toInt);
    if (
      page === null || block === null || paragraph === null || lineIndex === null ||
      wordIndex === null || left === null || top === null || width === null || height === null
    ) {
      continue;
    }

    words.push({
      text: cols.slice(11).join("\t"),
      confidence: parseConfidence(cols[10]),
      box: { x: left, y: top, w: width, h: height },
      page,
      block,
      paragraph,
      lineIndex,
      wordIndex,
    });
  }

  return words;
}
