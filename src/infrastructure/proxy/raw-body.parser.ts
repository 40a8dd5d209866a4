import { FastifyInstance, FastifyRequest } from 'fastify';
import { IncomingMessage } from 'http';

/**
 * Swaps Fastify's body parsers for one that leaves every request body as the
 * unread stream, whatever its content type, so the proxy can forward it as is.
 */
export function registerRawBodyParser(fastify: FastifyInstance): void {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    '*',
    (
      _request: FastifyRequest,
      payload: IncomingMessage,
      done: (err: Error | null, body?: unknown) => void,
    ) => done(null, payload),
  );
}
