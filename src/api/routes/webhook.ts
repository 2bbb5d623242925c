import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { WEBHOOK_RATE_LIMIT } from '../../config/system/constants';
import { WEBHOOK_RULES } from '../../config/search/validationRules';
import { SearchError, describeError } from '../../errors';
import { formatError, formatResult } from '../../services/responseFormatter';
import type { SearchService } from '../../services/searchService';

const webhookSchema = z.object({
  fulfillmentInfo: z.object({ tag: z.unknown().optional() }).passthrough().optional(),
  sessionInfo: z.object({ parameters: z.record(z.unknown()).optional() }).passthrough().optional(),
  text: z.unknown().optional(),
  payload: z.object({ queryText: z.unknown().optional() }).passthrough().optional()
});

export interface ExtractedQuery {
  query: string;
  tag: string;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Reads the query from an agent-platform request: session parameters first,
 * then a top-level `text`, then `payload.queryText`.
 */
export function extractQuery(body: unknown): ExtractedQuery {
  const parsed = webhookSchema.safeParse(body);
  if (!parsed.success) return { query: '', tag: '' };

  const { fulfillmentInfo, sessionInfo, text, payload } = parsed.data;
  const tag = asString(fulfillmentInfo?.tag).slice(0, WEBHOOK_RULES.tagMaxLength);
  if (sessionInfo?.parameters) {
    return { query: asString(sessionInfo.parameters.query).trim(), tag };
  }
  if (text !== undefined) {
    return { query: asString(text).trim(), tag };
  }
  if (payload && payload.queryText !== undefined) {
    return { query: asString(payload.queryText).trim(), tag };
  }
  return { query: '', tag };
}

function isJsonObject(contentType: string | undefined, body: unknown): boolean {
  return (
    typeof contentType === 'string' &&
    contentType.toLowerCase().startsWith('application/json') &&
    typeof body === 'object' &&
    body !== null
  );
}

function sendError(reply: FastifyReply, statusCode: number, message: string) {
  return reply.status(statusCode).send(formatError(message));
}

export async function registerWebhookRoutes(app: FastifyInstance, searchService: SearchService): Promise<void> {
  await app.register(async (scope) => {
    // Accept any body so non-JSON requests reach the handler and get the webhook error shape.
    scope.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
      done(null, body);
    });

    scope.setErrorHandler((err: FastifyError, req, reply) => {
      const statusCode = err.statusCode ?? 500;
      if (statusCode === 400) {
        req.log.warn({ err }, 'Rejected webhook body');
        return sendError(reply, 400, 'Invalid request body');
      }
      if (statusCode < 500) {
        return sendError(reply, statusCode, err.message);
      }
      req.log.error({ err }, 'Webhook error');
      return sendError(reply, 503, 'Service unavailable');
    });

    scope.post('/webhook', { config: { rateLimit: WEBHOOK_RATE_LIMIT } }, async (req, reply) => {
      if (!isJsonObject(req.headers['content-type'], req.body)) {
        req.log.error('Received non-JSON request');
        return sendError(reply, 400, 'Invalid content type');
      }

      const { query, tag } = extractQuery(req.body);
      req.log.info({ tag, query }, 'Webhook request');
      if (!query || query.length > WEBHOOK_RULES.queryMaxLength) {
        return sendError(reply, 400, 'Invalid query');
      }

      try {
        const selection = await searchService.search(query, req.log);
        if (selection.status === 'empty') {
          return reply.status(404).send(formatResult(null, query));
        }
        req.log.info(
          { type: selection.result.candidate.type, score: selection.result.score },
          'Search result selected'
        );
        return reply.send(formatResult(selection.result, query));
      } catch (err) {
        if (err instanceof SearchError) {
          req.log.warn({ err }, err.message);
          return sendError(reply, err.statusCode, err.publicMessage);
        }
        req.log.error({ err }, `Webhook error: ${describeError(err)}`);
        return sendError(reply, 503, 'Service unavailable');
      }
    });
  });
}
