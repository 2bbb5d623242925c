import type { FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../../config/env';
import { formatError } from '../../services/responseFormatter';

const OPEN_PATHS = ['/health', '/ready'];

export async function apiKeyGuard(req: FastifyRequest, reply: FastifyReply) {
  if (!config.API_KEY) return;
  if (OPEN_PATHS.some((p) => req.url.startsWith(p))) return;

  const headerKey = req.headers['x-api-key'];
  if (headerKey !== config.API_KEY) {
    return reply.status(401).send(formatError('Unauthorized'));
  }
}
