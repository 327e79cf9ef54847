import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { UpdateDebouncer } from '../application/index.js';
import type { EngineContext } from '../application/index.js';
import type { NotificationDocument } from '../domain/index.js';
import type { BridgeConfig } from './config.js';
import { createNotificationDispatcher } from './notifications/index.js';

export interface BridgePluginOptions {
  readonly config: BridgeConfig;
  readonly log: Logger;
  /** Defaults to a fresh 2-second debouncer. */
  readonly debouncer?: UpdateDebouncer;
  /** Defaults to the Discord dispatcher built from `config.discord`. */
  readonly deliver?: (document: NotificationDocument) => void;
}

/**
 * Fastify plugin that owns the transformation engine's context.
 *
 * - Builds the debouncer and delivery callback once per server.
 * - Decorates `fastify.bridge` for use by the webhook route.
 */
async function bridgePlugin(fastify: FastifyInstance, options: BridgePluginOptions): Promise<void> {
  const { config, log } = options;

  const context: EngineContext = {
    settings: {
      workspaceName: config.workspaceName,
      appUrl: config.appUrl,
      webhookSecret: config.webhookSecret,
    },
    debouncer: options.debouncer ?? new UpdateDebouncer(),
    deliver: options.deliver ?? createNotificationDispatcher(config.discord, log),
    log,
  };

  if (config.webhookSecret === '') {
    log.warn('WEBHOOK_SECRET is empty, signature verification is disabled');
  }
  if (config.discord.webhookUrl === '') {
    log.warn('DISCORD_WEBHOOK_URL is empty, notifications will not be delivered');
  }

  fastify.decorate('bridge', context);
}

export default fp(bridgePlugin, {
  name: 'bridge',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.bridge` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    bridge: EngineContext;
  }
}
