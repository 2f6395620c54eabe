/**
 * Dedup key derivation for log entries.
 *
 * The same record is OCR'd again on every frame while it stays on screen,
 * with small differences each time. The in-game timestamp is the most
 * stable part of the text, so it is the preferred identity.
 */

export const NO_KEY = "nokey";

const MAX_FALLBACK_KEY_LENGTH = 64;

// "Day 45, 13:07:02" with ':' or ';' separators and loose spacing
const TIMESTAMP_PATTERN = /day\s*(\d{1,6})\s*[,;]\s*(\d{1,2})[:;](\d{2})[:;](\d{2})/i;

const pad2 = (value: string) => String(Number.parseInt(value, 10)).padStart(2, "0");

/**
 * Key from the first "day N, HH:MM:SS" found anywhere in the text,
 * e.g. "d45-t130702". Returns null when no timestamp is legible.
 */
export function timestampKey(text: string): string | null {
  if (!text) return null;
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;
  const [, day, hh, mm, ss] = match;
  return `d${Number.parseInt(day, 10)}-t${pad2(hh)}${pad2(mm)}${pad2(ss)}`;
}

/**
 * Key from the header line itself: lowercased, reduced to [a-z0-9:;],
 * at most 64 characters, or "nokey" when nothing is left.
 */
export function headerFallbackKey(headerText: string): string {
  const cleaned = (headerText || "")
    .toLowerCase()
    .replace(/[^a-z0-9:;]/g, "")
    .slice(0, MAX_FALLBACK_KEY_LENGTH);
  return cleaned || NO_KEY;
}

export function canonicalKey(resolvedText: string, fallbackHeaderText: string): string {
  return timestampKey(resolvedText) ?? headerFallbackKey(fallbackHeaderText);
}
