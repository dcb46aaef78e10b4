import Fastify, { type FastifyInstance } from 'fastify';
import type { DownloadScheduler } from '../services/download-scheduler.js';
import { downloadRoutes } from './downloads.js';

export async function registerRoutes(fastify: FastifyInstance, scheduler: DownloadScheduler): Promise<void> {
  await fastify.register(downloadRoutes, { scheduler });
}

/**
 * Control API over the scheduler. Not listening yet: callers either `listen()`
 * or drive it with `inject()`.
 */
export async function buildServer(scheduler: DownloadScheduler): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  await registerRoutes(fastify, scheduler);

  // Health check endpoint
  fastify.get('/health', async (_request, reply) => {
    return reply.send({ status: 'ok' });
  });

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  return fastify;
}
