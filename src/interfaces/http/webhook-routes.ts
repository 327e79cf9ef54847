import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { processWebhook } from '../../application/index.js';

const SIGNATURE_HEADER = 'x-plane-signature';

/**
 * Registers the webhook ingestion routes.
 *
 * POST /, POST /*: verify, transform and forward one project-management event.
 * Any path is accepted so a webhook URL configured with a path keeps working.
 *
 * Not wrapped in fastify-plugin: the raw-body parser below replaces the
 * default parsers only inside this plugin's encapsulation context.
 * Bodies stay raw bytes whatever their content type; the signature is
 * computed over exactly those bytes.
 */
export default async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const header = request.headers[SIGNATURE_HEADER];
    const signature = typeof header === 'string' ? header : '';

    const outcome = processWebhook(rawBody, signature, fastify.bridge);

    if (outcome.status === 'rejected') {
      return reply.status(403).send({ error: 'Invalid signature' });
    }

    return reply.status(200).send({ status: outcome.status });
  };

  fastify.post('/', handler);
  fastify.post('/*', handler);
}
