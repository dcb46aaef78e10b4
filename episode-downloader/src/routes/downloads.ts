import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { DownloadScheduler } from '../services/download-scheduler.js';
import { DownloadRequestSchema, DownloadStatusSchema } from '../types/schemas.js';
import { formatBytes } from '../utils/format.js';

export type DownloadRoutesOptions = {
  scheduler: DownloadScheduler;
};

const ListQuerySchema = z.object({
  status: DownloadStatusSchema.optional(),
  anime: z.string().min(1).optional(),
});

const DeleteQuerySchema = z.object({
  scope: z.enum(['completed', 'all']).default('completed'),
});

interface KeyParams {
  key: string;
}

interface SlugParams {
  slug: string;
}

function badRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
  const issue = error.issues[0];
  const where = issue?.path.join('.') || 'body';
  return reply.status(400).send({ error: `Invalid ${where}: ${issue?.message ?? 'invalid value'}` });
}

export async function downloadRoutes(fastify: FastifyInstance, { scheduler }: DownloadRoutesOptions): Promise<void> {
  // List downloads, newest first
  fastify.get('/api/downloads', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = ListQuerySchema.safeParse(request.query);
    if (!query.success) {
      return badRequest(reply, query.error);
    }

    const { status, anime } = query.data;
    const downloads = scheduler
      .getAll(status)
      .filter(d => !anime || d.animeSlug === anime);
    return reply.send(downloads);
  });

  fastify.get('/api/downloads/summary', async (_request: FastifyRequest, reply: FastifyReply) => {
    const totalBytes = scheduler.totalDownloadSize();
    return reply.send({
      totalBytes,
      totalSize: formatBytes(totalBytes),
      anime: scheduler.getAnimeSummaries(),
    });
  });

  fastify.get<{ Params: KeyParams }>('/api/downloads/:key', async (request, reply) => {
    const download = scheduler.getDownload(request.params.key);
    if (!download) {
      return reply.status(404).send({ error: 'Download not found' });
    }
    return reply.send(download);
  });

  // Queue an episode
  fastify.post('/api/downloads', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = DownloadRequestSchema.safeParse(request.body);
    if (!body.success) {
      return badRequest(reply, body.error);
    }

    const result = scheduler.enqueue(body.data);
    return reply.status(result.accepted ? 202 : 409).send(result);
  });

  fastify.post<{ Params: KeyParams }>('/api/downloads/:key/cancel', async (request, reply) => {
    if (!scheduler.cancel(request.params.key)) {
      return reply.status(404).send({ error: 'Download not found' });
    }
    return reply.status(204).send();
  });

  fastify.post<{ Params: KeyParams }>('/api/downloads/:key/retry', async (request, reply) => {
    const { key } = request.params;
    if (!scheduler.getDownload(key)) {
      return reply.status(404).send({ error: 'Download not found' });
    }
    if (!scheduler.retry(key)) {
      return reply.status(409).send({ error: 'Only failed or paused downloads can be retried' });
    }
    return reply.status(204).send();
  });

  fastify.delete<{ Params: KeyParams }>('/api/downloads/:key', async (request, reply) => {
    await scheduler.delete(request.params.key);
    return reply.status(204).send();
  });

  // Bulk delete: completed downloads by default, everything with scope=all
  fastify.delete('/api/downloads', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = DeleteQuerySchema.safeParse(request.query);
    if (!query.success) {
      return badRequest(reply, query.error);
    }

    const deleted = query.data.scope === 'all'
      ? await scheduler.deleteAll()
      : await scheduler.deleteCompleted();
    return reply.send({ deleted });
  });

  fastify.delete<{ Params: SlugParams }>('/api/anime/:slug/downloads', async (request, reply) => {
    const deleted = await scheduler.deleteAnimeDownloads(request.params.slug);
    return reply.send({ deleted });
  });
}
