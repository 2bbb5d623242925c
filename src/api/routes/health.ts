import type { FastifyInstance } from 'fastify';
import type { ContentRepository } from '../../repositories/contentRepository';

type Service = 'api' | 'db';
type ServiceState = 'ok' | 'error';

async function checkDb(repository: ContentRepository): Promise<ServiceState> {
  try {
    await repository.ping();
    return 'ok';
  } catch {
    return 'error';
  }
}

export async function registerHealthRoutes(app: FastifyInstance, repository: ContentRepository): Promise<void> {
  app.get('/health', async (req, reply) => {
    const checks: Record<Service, ServiceState> = {
      api: 'ok',
      db: await checkDb(repository)
    };

    const healthy = Object.values(checks).every((state) => state === 'ok');
    if (!healthy) {
      req.log.error({ services: checks }, 'Health check failed');
    }
    return reply.status(healthy ? 200 : 503).send({ status: healthy ? 'ok' : 'unhealthy', services: checks });
  });

  app.get('/ready', async () => ({ status: 'ready' }));
}
