import fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { createPool, closePool } from '../db/db';
import { type ContentRepository, PgContentRepository } from '../repositories/contentRepository';
import { CandidateProvider } from '../services/candidateProvider';
import { SearchService, type SearchServiceOptions } from '../services/searchService';
import { createPublicUrlResolver, type PublicUrlResolver } from '../services/storageUrl';
import { registerWebhookRoutes } from './routes/webhook';
import { registerHealthRoutes } from './routes/health';
import { registerStatsRoutes } from './routes/stats';
import { registerIngestRoutes } from './routes/ingest';
import { apiKeyGuard } from './hooks/auth';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';

export interface ServerDependencies {
  repository?: ContentRepository;
  resolveUrl?: PublicUrlResolver;
  retry?: SearchServiceOptions['retry'];
}

export async function buildServer(deps: ServerDependencies = {}) {
  const app = fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]']
    }
  });

  let repository = deps.repository;
  if (!repository) {
    const pool = createPool(config.DATABASE_URL, app.log);
    app.addHook('onClose', async () => {
      await closePool(pool);
    });
    repository = new PgContentRepository(pool);
  }

  const resolveUrl =
    deps.resolveUrl ??
    createPublicUrlResolver({ baseUrl: config.STORAGE_PUBLIC_BASE_URL, bucket: config.STORAGE_BUCKET });
  const searchService = new SearchService({
    provider: new CandidateProvider(repository, resolveUrl),
    logger: app.log,
    retry: deps.retry
  });

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  app.addHook('onRequest', apiKeyGuard);
  await registerHealthRoutes(app, repository);
  await registerStatsRoutes(app, repository);
  await registerIngestRoutes(app);
  await registerWebhookRoutes(app, searchService);

  return app;
}

if (process.env.NODE_ENV !== 'test' && require.main === module) {
  buildServer()
    .then((app) => {
      const shutdown = () => {
        app.log.info('Shutting down');
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err }, 'Shutdown failed');
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      return app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`webhook API running on ${config.PORT}`);
      });
    })
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
