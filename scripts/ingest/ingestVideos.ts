import fs from 'fs/promises';
import { z } from 'zod';
import { config } from '../../src/config/env';
import { closePool, createPool } from '../../src/db/db';
import { createLogger } from '../../src/logger';
import { upsertVideo } from '../utils/ingestDb';

const log = createLogger('ingest-videos');

const videoCatalogueSchema = z.array(
  z.object({
    title: z.string().min(1),
    description: z.string().default(''),
    video_url: z.string().url(),
    duration: z.string().default(''),
    views: z.coerce.number().int().nonnegative().default(0)
  })
);

const pool = createPool(config.DATABASE_URL, log);

async function main() {
  const file = z.string().min(1, 'catalogue path is required').parse(process.argv[2]);
  const videos = videoCatalogueSchema.parse(JSON.parse(await fs.readFile(file, 'utf8')));

  const client = await pool.connect();
  try {
    for (const video of videos) {
      await upsertVideo(client, {
        title: video.title,
        description: video.description,
        videoUrl: video.video_url,
        duration: video.duration,
        views: video.views
      });
    }
  } finally {
    client.release();
  }
  log.info({ count: videos.length }, 'Videos upserted');
}

main()
  .catch((err) => {
    log.error({ err }, 'ingestVideos failed');
    process.exitCode = 1;
  })
  .then(() => closePool(pool))
  .catch((err) => {
    log.error({ err }, 'Failed to close database pool');
    process.exitCode = 1;
  });
