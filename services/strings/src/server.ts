import Fastify, { type FastifyServerOptions } from 'fastify';
import { config } from './config';
import { AppError, NotFoundError } from './errors';
import { registerStringRoutes } from './routes/strings';
import { toOrderedJson } from './serialization/orderedJson';
import { InMemoryStringStore } from './storage/memoryStringStore';
import type { StringStore } from './contracts/stringStore';

export interface BuildAppOptions {
  /** Backing store; a fresh in-memory store is created when omitted. */
  store?: StringStore;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const store = options.store ?? new InMemoryStringStore();
  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: config.bodyLimitBytes,
    // GET/DELETE carry the raw string in the path, so a segment may be as long as a POSTed value
    maxParamLength: config.bodyLimitBytes,
  });

  app.setReplySerializer((payload) => toOrderedJson(payload));

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      return reply.code(err.statusCode).send({ error: err.code, detail: err.message });
    }
    // framework-level rejections: malformed JSON, oversized bodies, unsupported content types
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: 'invalid_input', detail: err.message });
    }
    req.log.error({ err }, 'Request failed');
    return reply.code(500).send({ error: 'internal_error' });
  });

  app.setNotFoundHandler((req, reply) => {
    const err = new NotFoundError(`Route ${req.method}:${req.url} not found`);
    return reply.code(err.statusCode).send({ error: err.code, detail: err.message });
  });

  app.get('/health', async () => {
    return { status: 'ok', strings: await store.size() };
  });

  await registerStringRoutes(app, { store });
  return app;
}
