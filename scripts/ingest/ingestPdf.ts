import fs from 'fs/promises';
import path from 'path';
import type { Pool } from 'pg';
import { config } from '../../src/config/env';
import { INGEST_DEFAULTS, INGEST_RATE_LIMIT } from '../../src/config/ingest/constants';
import { closePool, createPool } from '../../src/db/db';
import { createLogger } from '../../src/logger';
import { encodeObjectPath } from '../../src/services/storageUrl';
import { parseIngestPdfArgs } from '../utils/args';
import { matchExtractedImages } from '../utils/imageFiles';
import { ingestImages } from '../utils/imageIngest';
import { inTransaction, insertImage, insertTextPage } from '../utils/ingestDb';
import { uploadObject } from '../utils/objectStore';
import { extractPdfText } from '../utils/pdf';
import { defaultSleep } from '../../src/utils/retry';
import { describeImage } from '../utils/vision';

const log = createLogger('ingest-pdf');

async function processPdf(pool: Pool, file: string): Promise<boolean> {
  const sourceFile = path.basename(file);
  log.info({ file }, 'Starting text extraction');
  try {
    const { pages, numPages, pagesSplit } = await extractPdfText(await fs.readFile(file));
    if (!pagesSplit) {
      log.warn({ numPages }, 'Page boundaries not recoverable, storing the document as one page');
    }

    const client = await pool.connect();
    try {
      await inTransaction(
        client,
        async () => {
          for (const { page, content } of pages) {
            await insertTextPage(client, { sourceFile, page, content, processor: INGEST_DEFAULTS.processor });
          }
        },
        log
      );
    } finally {
      client.release();
    }

    log.info({ pages: pages.length }, 'Successfully processed pages');
    return true;
  } catch (err) {
    log.error({ err }, 'Text extraction failed');
    return false;
  }
}

async function extractImages(pool: Pool, file: string, imagesDir: string): Promise<boolean> {
  const sourceFile = path.basename(file);
  const accessToken = config.STORAGE_ACCESS_TOKEN;
  if (!accessToken) {
    log.error('STORAGE_ACCESS_TOKEN is required to upload images');
    return false;
  }

  log.info({ file, imagesDir }, 'Starting image ingestion');
  try {
    const images = matchExtractedImages(sourceFile, await fs.readdir(imagesDir));
    const client = await pool.connect();
    let imageCount: number;
    try {
      imageCount = await ingestImages(images, {
        sourceFile,
        readImage: (fileName) => fs.readFile(path.join(imagesDir, fileName)),
        describe: (content) =>
          describeImage(content, { endpoint: config.VISION_ENDPOINT, apiKey: config.VISION_API_KEY }),
        upload: (objectPath, content, contentType) =>
          uploadObject(
            { uploadBaseUrl: config.STORAGE_UPLOAD_BASE_URL, bucket: config.STORAGE_BUCKET, accessToken },
            objectPath,
            content,
            contentType
          ),
        publicUrl: (objectPath) =>
          `${config.STORAGE_PUBLIC_BASE_URL}/${config.STORAGE_BUCKET}/${encodeObjectPath(objectPath)}`,
        insert: (row) => insertImage(client, row),
        pause: () => defaultSleep(INGEST_RATE_LIMIT.perRequestDelayMs),
        log
      });
    } finally {
      client.release();
    }

    log.info({ imageCount, candidates: images.length }, 'Image ingestion finished');
    return true;
  } catch (err) {
    log.error({ err }, 'Image ingestion failed');
    return false;
  }
}

async function main(pool: Pool) {
  const args = parseIngestPdfArgs(process.argv.slice(2));
  const started = Date.now();

  const textOk = await processPdf(pool, args.file);
  let imagesOk = true;
  if (args.extractImages && textOk) {
    imagesOk = await extractImages(pool, args.file, args.imagesDir ?? path.dirname(args.file));
  }

  log.info({ seconds: ((Date.now() - started) / 1000).toFixed(2) }, 'Total processing time');
  if (!textOk || !imagesOk) {
    process.exitCode = 1;
  }
}

const pool = createPool(config.DATABASE_URL, log);

main(pool)
  .catch((err) => {
    log.error({ err }, 'ingestPdf failed');
    process.exitCode = 1;
  })
  .then(() => closePool(pool))
  .catch((err) => {
    log.error({ err }, 'Failed to close database pool');
    process.exitCode = 1;
  });
