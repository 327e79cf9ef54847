import type { Logger } from 'pino';
import type { DiscordConfig } from '../config.js';
import type { NotificationDocument } from '../../domain/index.js';

/** Discord embed wire shape (subset used by the bridge). */
export interface DiscordEmbed {
  title?: string;
  description?: string;
  color: number;
  author?: { name: string; icon_url: string };
  thumbnail?: { url: string };
  footer?: { text: string; icon_url?: string };
  fields?: { name: string; value: string; inline: boolean }[];
}

export interface DiscordWebhookPayload {
  username: string;
  avatar_url: string;
  embeds: DiscordEmbed[];
}

/** Maps a notification document onto a Discord embed; empty parts, including empty-valued fields, are omitted. */
export function toDiscordEmbed(document: NotificationDocument): DiscordEmbed {
  const embed: DiscordEmbed = { color: document.color };

  if (document.title) embed.title = document.title;
  if (document.description) embed.description = document.description;
  embed.author = { name: document.author.name, icon_url: document.author.iconUrl };
  if (document.thumbnailUrl) embed.thumbnail = { url: document.thumbnailUrl };
  if (document.footer) {
    embed.footer = document.footer.iconUrl
      ? { text: document.footer.text, icon_url: document.footer.iconUrl }
      : { text: document.footer.text };
  }
  // Discord rejects the whole embed when any field value is empty.
  const fields = document.fields.filter((field) => field.value !== '');
  if (fields.length > 0) {
    embed.fields = fields.map((field) => ({
      name: field.name,
      value: field.value,
      inline: field.inline,
    }));
  }

  return embed;
}

/** Wraps a single embed with the bridge's sender identity. */
export function buildDiscordPayload(
  document: NotificationDocument,
  config: Pick<DiscordConfig, 'username' | 'avatarUrl'>,
): DiscordWebhookPayload {
  return {
    username: config.username,
    avatar_url: config.avatarUrl,
    embeds: [toDiscordEmbed(document)],
  };
}

/**
 * Posts a notification to the Discord incoming webhook.
 *
 * Skips when no webhook URL is configured. Non-OK responses and network
 * errors are logged; nothing is thrown and nothing is retried.
 */
export async function sendDiscordNotification(
  config: DiscordConfig,
  log: Logger,
  document: NotificationDocument,
): Promise<void> {
  if (!config.webhookUrl) {
    log.debug({ title: document.title }, 'Discord notification skipped (no webhook URL)');
    return;
  }

  try {
    const response = await fetch(config.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildDiscordPayload(document, config)),
    });

    if (response.ok) {
      log.info({ title: document.title }, 'Discord notification sent');
    } else {
      log.warn(
        { status: response.status, title: document.title },
        'Discord webhook returned non-OK status',
      );
    }
  } catch (err: unknown) {
    log.warn({ err, title: document.title }, 'Failed to send Discord notification');
  }
}
