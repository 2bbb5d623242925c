import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { spawn } from 'child_process';
import path from 'path';
import fs from 'fs';

const ingestSchema = z.object({
  file: z.string().min(1),
  extractImages: z.boolean().default(false),
  imagesDir: z.string().min(1).optional()
});

export const INGEST_SCRIPT = path.join('dist', 'scripts', 'ingest', 'ingestPdf.js');

export function buildIngestArgs(input: z.infer<typeof ingestSchema>): string[] {
  const args = [input.file];
  if (input.extractImages) args.push('--extract-images');
  if (input.imagesDir) args.push('--images-dir', input.imagesDir);
  return args;
}

export async function registerIngestRoutes(app: FastifyInstance): Promise<void> {
  app.post('/ingest', { config: { rateLimit: { max: 5, timeWindow: '1 minute' } } }, async (req, reply) => {
    const parsed = ingestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const scriptPath = path.join(process.cwd(), INGEST_SCRIPT);
    if (!fs.existsSync(scriptPath)) {
      return reply.status(500).send({ error: `Ingest script not found: ${INGEST_SCRIPT}` });
    }

    const { file, extractImages } = parsed.data;
    const child = spawn(process.execPath, [scriptPath, ...buildIngestArgs(parsed.data)], {
      stdio: 'inherit'
    });

    child.on('error', (err) => {
      app.log.error({ err, file }, 'ingest job failed to start');
    });

    child.on('exit', (code) => {
      const status = code === 0 ? 'completed' : `failed (code ${code})`;
      app.log.info({ file, extractImages, status }, 'ingest job finished');
    });

    return reply.status(202).send({
      message: 'Ingest started',
      file,
      extractImages,
      pid: child.pid
    });
  });
}
