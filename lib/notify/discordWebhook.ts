/**
 * Discord webhook notifier.
 *
 * Posts JSON when there is no attachment, multipart/form-data with a
 * payload_json part and one file part when there is.
 */

import type { DiscordAllowedMentions } from "@/lib/triggers/mentions";

const REQUEST_TIMEOUT_MS = 15_000;

export type Notification = {
  content: string;
  image?: Buffer | null;
  filename?: string;
  allowedMentions?: DiscordAllowedMentions;
};

/**
 * Notification sink. Rejects on failure; the caller decides what a failed
 * post means for the current cycle.
 */
export interface Notifier {
  send(notification: Notification): Promise<void>;
}

export class NotifyError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly body: string | null = null
  ) {
    super(message);
    this.name = "NotifyError";
  }
}

export class DiscordWebhookNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async send({ content, image, filename = "log_hit.png", allowedMentions }: Notification): Promise<void> {
    if (!this.webhookUrl) {
      throw new NotifyError(
        "Discord webhook URL not set (discordWebhookUrl in config or DISCORD_WEBHOOK_URL).",
        null
      );
    }

    const payload: { content: string; allowed_mentions?: DiscordAllowedMentions } = { content };
    if (allowedMentions) payload.allowed_mentions = allowedMentions;

    let init: RequestInit;
    if (image && image.length > 0) {
      const formData = new FormData();
      formData.append("payload_json", JSON.stringify(payload));
      formData.append("file", new Blob([new Uint8Array(image)], { type: "image/png" }), filename);
      init = { method: "POST", body: formData };
    } else {
      init = {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      };
    }

    const response = await this.fetchImpl(this.webhookUrl, {
      ...init,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new NotifyError(
        `Discord webhook returned ${response.status}: ${text.slice(0, 200)}`,
        response.status,
        text
      );
    }
  }
}
