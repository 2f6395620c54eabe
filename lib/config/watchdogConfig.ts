/**
 * Watchdog configuration.
 *
 * One JSON file, validated once at startup into an immutable object that
 * every stage receives as a plain parameter. Environment variables are read
 * from .env.local / .env via dotenv before the file is located.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { DEFAULT_ENTRY_HEADER_PATTERN } from "@/lib/entries/entrySegmenter";

export const DEFAULT_CONFIG_PATH = "watchdog.config.json";

const rectSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  w: z.number().int(),
  h: z.number().int(),
});

// "@here" / "@everyone" are accepted as written in older config files
const mentionModeSchema = z
  .enum(["none", "here", "everyone", "custom", "@here", "@everyone"])
  .transform((mode) => (mode === "@here" ? "here" : mode === "@everyone" ? "everyone" : mode));

export const triggerSchema = z.object({
  name: z.string().default("Untitled"),
  type: z.enum(["keyword", "regex"]).default("keyword"),
  match: z.string().default(""),
  mentionMode: mentionModeSchema.default("none"),
  mentionCustom: z.string().default(""),
  prefix: z.string().default(""),
  suffix: z.string().default(""),
});

const allowedMentionsSchema = z.object({
  everyone: z.boolean().default(true),
  roles: z.boolean().default(true),
  users: z.boolean().default(false),
  roleIds: z.array(z.string()).default([]),
  userIds: z.array(z.string()).default([]),
});

const DEFAULT_TRIGGERS: z.input<typeof triggerSchema>[] = [
  { name: "Killed", type: "regex", match: "(?i)killed", mentionMode: "here" },
  { name: "Destroyed", type: "regex", match: "(?i)destroyed", mentionMode: "here" },
];

export const watchdogConfigSchema = z
  .object({
    captureRect: rectSchema.nullable().default(null),
    /** Display id passed to screenshot-desktop; null grabs the default screen */
    captureScreen: z.union([z.string(), z.number().int()]).nullable().default(null),
    captureIntervalMs: z.number().int().min(0).default(750),
    sendOnlyNewest: z.boolean().default(true),
    matchMode: z.enum(["entries", "lines"]).default("entries"),

    ocrScale: z.number().positive().default(2),
    psmLines: z.number().int().min(0).max(13).default(6),
    reocrPsm: z.number().int().min(0).max(13).default(6),
    minWordConf: z.number().int().default(0),
    tesseractWhitelist: z.string().default(""),
    tesseractLang: z.string().default("eng"),

    tightenColumns: z.boolean().default(true),
    entryBboxPadLr: z.number().int().min(0).default(4),
    entryBboxPadV: z.number().int().min(0).default(0),
    entryMaxHeightPx: z.number().int().positive().default(360),
    entryHeaderRegex: z.string().default(DEFAULT_ENTRY_HEADER_PATTERN),

    triggers: z.array(triggerSchema).default(DEFAULT_TRIGGERS),

    discordWebhookUrl: z.string().default(""),
    discordAllowedMentions: allowedMentionsSchema.default({}),

    keywords: z.array(z.string()).default([]),
    keywordsFile: z.string().default(""),
    regexPatterns: z.array(z.string()).optional(),
    /** @deprecated older name for regexPatterns */
    regex: z.array(z.string()).optional(),

    saveCaptures: z.boolean().default(true),
    capturesDir: z.string().default("captures"),

    lineDedupTtlSeconds: z.number().positive().default(60),
    lineDedupMaxSize: z.number().int().positive().default(512),
  })
  .transform(({ regex, regexPatterns, ...rest }) => ({
    ...rest,
    regexPatterns: regexPatterns ?? regex ?? [],
  }));

export type WatchdogConfig = Readonly<z.output<typeof watchdogConfigSchema>>;
export type TriggerConfig = z.output<typeof triggerSchema>;
export type AllowedMentionsConfig = z.output<typeof allowedMentionsSchema>;
export type CaptureRect = z.output<typeof rectSchema>;

/**
 * Validate a raw config object and fill in defaults.
 * Throws with every failing field listed.
 */
export function parseWatchdogConfig(raw: unknown): WatchdogConfig {
  const result = watchdogConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid watchdog config: ${details}`);
  }
  return Object.freeze(result.data);
}

/**
 * Resolve the config file path: explicit argument, then WATCHDOG_CONFIG,
 * then ./watchdog.config.json.
 */
export function getConfigPath(explicitPath?: string): string {
  return resolve(process.cwd(), explicitPath || process.env.WATCHDOG_CONFIG || DEFAULT_CONFIG_PATH);
}

/**
 * Load .env files, then read and validate the config file.
 */
export function loadWatchdogConfig(explicitPath?: string): WatchdogConfig {
  // .env.local first, then .env; dotenv never overrides a variable already set
  loadDotenv({ path: resolve(process.cwd(), ".env.local") });
  loadDotenv({ path: resolve(process.cwd(), ".env") });

  const path = getConfigPath(explicitPath);
  if (!existsSync(path)) {
    throw new Error(`Missing ${path}. Copy config/watchdog.example.json and edit it.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(
      `Could not parse ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseWatchdogConfig(raw);
}

/**
 * Webhook URL from config, else DISCORD_WEBHOOK_URL.
 */
export function getDiscordWebhookUrl(config: Pick<WatchdogConfig, "discordWebhookUrl">): string {
  return config.discordWebhookUrl.trim() || (process.env.DISCORD_WEBHOOK_URL ?? "").trim();
}
