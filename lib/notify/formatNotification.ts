import type { TriggerMatch } from "@/lib/triggers/triggerResolver";
import { buildMention } from "@/lib/triggers/mentions";

export const NOTIFICATION_BANNER = "**Log Watchdog match**";

/**
 * Message body for a matched entry:
 *
 *   [mention]
 *   [prefix]
 *   **Log Watchdog match**
 *   - [87%] Day 45, 13:07:02: ... (match: killed)
 *   [suffix]
 */
export function formatNotification({
  match,
  text,
  confidence,
}: {
  match: TriggerMatch;
  text: string;
  confidence: number;
}): string {
  const { trigger, matched } = match;
  const parts: string[] = [];

  const mention = buildMention(trigger);
  if (mention) parts.push(mention);

  const prefix = trigger.prefix.trim();
  if (prefix) parts.push(prefix);

  parts.push(NOTIFICATION_BANNER);
  parts.push(`- [${Math.trunc(confidence)}%] ${text} (match: ${matched || "trigger"})`);

  const suffix = trigger.suffix.trim();
  if (suffix) parts.push(suffix);

  return parts.join("\n");
}
