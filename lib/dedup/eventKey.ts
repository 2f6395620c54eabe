import { createHash } from "crypto";
import type { Rect } from "@/lib/ocr/types";

export type RgbColor = readonly [number, number, number];

function sha1Hex(value: string): string {
  return createHash("sha1").update(value, "utf8").digest("hex");
}

/**
 * Content key for a matched line: SHA-1 hex of its text. With textOnly off
 * and a box given, position and color are part of the key, so the same
 * text at another place on screen counts as a new event.
 */
export function eventKey(text: string, box?: Rect | null, color?: RgbColor | null, textOnly = true): string {
  if (textOnly || !box) return sha1Hex(text);
  const where = `${box.x},${box.y},${box.w},${box.h}`;
  return sha1Hex(`${text}|${where}|${color ? color.join(",") : ""}`);
}
