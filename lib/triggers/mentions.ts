import type { AllowedMentionsConfig } from "@/lib/config/watchdogConfig";
import type { ResolvedTrigger } from "./compileTriggers";

/**
 * Discord allowed_mentions payload.
 * See https://discord.com/developers/docs/resources/message#allowed-mentions-object
 */
export type DiscordAllowedMentions = {
  parse: Array<"everyone" | "roles" | "users">;
  roles?: string[];
  users?: string[];
};

/**
 * Mention text placed on the first line of a notification.
 * Custom mentions ("<@&123>") are passed through trimmed; the caller is
 * responsible for their syntax.
 */
export function buildMention(trigger: ResolvedTrigger | null): string {
  if (!trigger) return "";
  switch (trigger.mentionMode) {
    case "here":
      return "@here";
    case "everyone":
      return "@everyone";
    case "custom":
      return trigger.mentionCustom.trim();
    case "none":
      return "";
  }
}

/**
 * Build allowed_mentions from config. Discord rejects a category that is
 * both in parse and given as an id list, so an id list replaces the
 * category's parse entry.
 */
export function buildAllowedMentions(allowed: AllowedMentionsConfig): DiscordAllowedMentions {
  const payload: DiscordAllowedMentions = { parse: [] };
  if (allowed.everyone) payload.parse.push("everyone");

  if (allowed.roles && allowed.roleIds.length > 0) {
    payload.roles = [...allowed.roleIds];
  } else if (allowed.roles) {
    payload.parse.push("roles");
  }

  if (allowed.users && allowed.userIds.length > 0) {
    payload.users = [...allowed.userIds];
  } else if (allowed.users) {
    payload.parse.push("users");
  }

  return payload;
}
