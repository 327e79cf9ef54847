export { loadBridgeConfig, ConfigError } from './config.js';
export type { BridgeConfig, DiscordConfig } from './config.js';
export {
  sendDiscordNotification,
  toDiscordEmbed,
  buildDiscordPayload,
  createNotificationDispatcher,
} from './notifications/index.js';
export type { DiscordEmbed, DiscordWebhookPayload } from './notifications/index.js';
export { default as bridgePlugin } from './bridge-plugin.js';
export type { BridgePluginOptions } from './bridge-plugin.js';
