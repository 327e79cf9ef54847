export { sendDiscordNotification, toDiscordEmbed, buildDiscordPayload } from './discord.js';
export type { DiscordEmbed, DiscordWebhookPayload } from './discord.js';
export { createNotificationDispatcher } from './dispatcher.js';
