import Fastify from 'fastify';
import { bridgePlugin } from './infrastructure/index.js';
import type { BridgePluginOptions } from './infrastructure/index.js';
import { webhookRoutes, healthRoutes } from './interfaces/http/index.js';

/**
 * Assembles the Fastify server without listening.
 *
 * Order:
 * 1) Bridge context (debouncer, delivery, settings)
 * 2) HTTP routes
 *
 * Tests drive the returned instance through `inject()`.
 */
export async function buildApp(options: BridgePluginOptions) {
  const fastify = Fastify({
    loggerInstance: options.log,
  });

  await fastify.register(bridgePlugin, options);

  await fastify.register(webhookRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
