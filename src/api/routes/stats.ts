import type { FastifyInstance } from 'fastify';
import { COLLECTIONS } from '../../config/search/constants';
import type { ContentRepository } from '../../repositories/contentRepository';

export async function registerStatsRoutes(app: FastifyInstance, repository: ContentRepository): Promise<void> {
  app.get('/stats', async (_req, reply) => {
    const [texts, images, videos] = await Promise.all([
      repository.countAll(COLLECTIONS.text),
      repository.countAll(COLLECTIONS.image),
      repository.countAll(COLLECTIONS.video)
    ]);
    return reply.send({ texts, images, videos });
  });
}
