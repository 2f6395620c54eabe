/**
 * Trigger compilation.
 *
 * Triggers arrive from config as { type, match } pairs. They are resolved
 * once per watch run into a tagged variant with regexes already compiled,
 * so the per-entry resolver never re-reads type strings or re-compiles.
 */

import { existsSync, readFileSync } from "fs";
import { compilePattern } from "@/lib/entries/entrySegmenter";
import type { TriggerConfig } from "@/lib/config/watchdogConfig";

export type MentionMode = TriggerConfig["mentionMode"];

type TriggerPresentation = {
  name: string;
  mentionMode: MentionMode;
  mentionCustom: string;
  prefix: string;
  suffix: string;
};

export type KeywordTrigger = TriggerPresentation & {
  kind: "keyword";
  needle: string;
};

export type RegexTrigger = TriggerPresentation & {
  kind: "regex";
  pattern: RegExp;
};

export type LegacyTrigger = TriggerPresentation & {
  kind: "legacy";
};

export type CompiledTrigger = KeywordTrigger | RegexTrigger;
export type ResolvedTrigger = CompiledTrigger | LegacyTrigger;

export const LEGACY_TRIGGER: LegacyTrigger = Object.freeze({
  kind: "legacy",
  name: "Legacy",
  mentionMode: "none",
  mentionCustom: "",
  prefix: "",
  suffix: "",
});

/**
 * Compile configured triggers in order. Empty patterns are dropped silently,
 * malformed regexes are dropped with a warning.
 */
export function compileTriggers(triggers: readonly TriggerConfig[]): CompiledTrigger[] {
  const compiled: CompiledTrigger[] = [];

  for (const trigger of triggers) {
    if (!trigger.match) continue;

    const presentation: TriggerPresentation = {
      name: trigger.name,
      mentionMode: trigger.mentionMode,
      mentionCustom: trigger.mentionCustom,
      prefix: trigger.prefix,
      suffix: trigger.suffix,
    };

    if (trigger.type === "regex") {
      try {
        compiled.push({ ...presentation, kind: "regex", pattern: compilePattern(trigger.match, true) });
      } catch (error) {
        console.warn(`[Triggers] Skipping trigger '${trigger.name}', bad regex '${trigger.match}':`, error);
      }
    } else {
      compiled.push({ ...presentation, kind: "keyword", needle: trigger.match.toLowerCase() });
    }
  }

  return compiled;
}

/**
 * Compile legacy regex patterns, dropping malformed ones with a warning.
 */
export function compileLegacyPatterns(patterns: readonly string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(compilePattern(pattern));
    } catch (error) {
      console.warn(`[Triggers] Dropping legacy regex '${pattern}':`, error);
    }
  }
  return compiled;
}

/**
 * Legacy keyword list: configured keywords plus one per line of keywordsFile
 * (when it exists), trimmed, without duplicates.
 */
export function loadLegacyKeywords(keywords: readonly string[], keywordsFile?: string): string[] {
  const result: string[] = [];
  const add = (value: string) => {
    const keyword = value.trim();
    if (keyword && !result.includes(keyword)) result.push(keyword);
  };

  keywords.forEach(add);

  if (keywordsFile && existsSync(keywordsFile)) {
    readFileSync(keywordsFile, "utf-8").split(/\r?\n/).forEach(add);
  }

  return result;
}
