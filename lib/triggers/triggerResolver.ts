/**
 * First-match-wins trigger resolution.
 *
 * Trigger order is priority: operators put specific triggers ("Destroyed")
 * ahead of generic ones, so the first trigger that matches decides how the
 * entry is announced. When none matches, the older flat keyword / regex
 * lists are consulted and a "Legacy" trigger is synthesized.
 */

import { LEGACY_TRIGGER, type CompiledTrigger, type ResolvedTrigger } from "./compileTriggers";

export type TriggerMatch = {
  trigger: ResolvedTrigger;
  /** Keyword or regex source that fired */
  matched: string;
};

function matchesTrigger(trigger: CompiledTrigger, text: string, lower: string): boolean {
  switch (trigger.kind) {
    case "keyword":
      return lower.includes(trigger.needle);
    case "regex":
      return trigger.pattern.test(text);
  }
}

function triggerSource(trigger: CompiledTrigger): string {
  return trigger.kind === "regex" ? trigger.pattern.source : trigger.needle;
}

/**
 * Legacy matcher: first keyword contained (case-insensitive), else the first
 * pattern that matches. Returns what matched, or null.
 */
export function matchLegacy(
  text: string,
  keywords: readonly string[],
  patterns: readonly RegExp[]
): string | null {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  for (const keyword of keywords) {
    if (lower.includes(keyword.toLowerCase())) return keyword;
  }
  for (const pattern of patterns) {
    if (pattern.test(trimmed)) return pattern.source;
  }
  return null;
}

/**
 * Resolve the trigger for an entry's text.
 *
 * @returns The winning trigger and what matched, or null when nothing did
 */
export function resolveTrigger(
  text: string,
  triggers: readonly CompiledTrigger[],
  legacyKeywords: readonly string[],
  legacyPatterns: readonly RegExp[]
): TriggerMatch | null {
  const lower = text.toLowerCase();
  for (const trigger of triggers) {
    if (matchesTrigger(trigger, text, lower)) {
      return { trigger, matched: triggerSource(trigger) };
    }
  }

  const legacy = matchLegacy(text, legacyKeywords, legacyPatterns);
  if (legacy === null) return null;
  return { trigger: LEGACY_TRIGGER, matched: legacy };
}
