import type { Logger } from 'pino';
import type { DiscordConfig } from '../config.js';
import type { NotificationDocument } from '../../domain/index.js';
import { sendDiscordNotification } from './discord.js';

/**
 * Returns the delivery callback handed to the transformation engine.
 *
 * Fire-and-forget: the send is started and never awaited, so the webhook
 * response does not wait on Discord. Failures end up in the log only.
 */
export function createNotificationDispatcher(
  config: DiscordConfig,
  log: Logger,
) {
  return (document: NotificationDocument): void => {
    void sendDiscordNotification(config, log, document).catch((err: unknown) => {
      log.warn({ err }, 'Discord dispatch failed');
    });
  };
}
