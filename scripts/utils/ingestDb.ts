import type { PoolClient } from 'pg';
import type { BaseLogger } from 'pino';

export interface SqlRunner {
  query(text: string): Promise<unknown>;
}

/** Runs `work` between BEGIN and COMMIT. A failed ROLLBACK is logged; the original error is rethrown. */
export async function inTransaction<T>(client: SqlRunner, work: () => Promise<T>, log: BaseLogger): Promise<T> {
  try {
    await client.query('BEGIN');
    const result = await work();
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      log.error({ err: rollbackErr }, 'Rollback failed');
    }
    throw err;
  }
}

export interface TextPageRow {
  sourceFile: string;
  page: number;
  content: string;
  processor: string;
  width?: number | null;
  height?: number | null;
}

export interface ImageRow {
  sourceFile: string;
  page: number;
  imageIndex: number;
  imagePath: string;
  publicUrl: string | null;
  description: string;
  format: string;
  width?: number | null;
  height?: number | null;
}

export interface VideoRow {
  title: string;
  description: string;
  videoUrl: string;
  duration: string;
  views: number;
}

export async function insertTextPage(client: PoolClient, row: TextPageRow): Promise<void> {
  await client.query(
    `
    INSERT INTO pdf_text (source_file, page, content, width, height, processor)
    VALUES ($1, $2, $3, $4, $5, $6);
    `,
    [row.sourceFile, row.page, row.content, row.width ?? null, row.height ?? null, row.processor]
  );
}

export async function insertImage(client: PoolClient, row: ImageRow): Promise<void> {
  await client.query(
    `
    INSERT INTO pdf_images (source_file, page, image_index, image_path, public_url, description, width, height, format)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9);
    `,
    [
      row.sourceFile,
      row.page,
      row.imageIndex,
      row.imagePath,
      row.publicUrl,
      row.description,
      row.width ?? null,
      row.height ?? null,
      row.format
    ]
  );
}

export async function upsertVideo(client: PoolClient, row: VideoRow): Promise<void> {
  await client.query(
    `
    INSERT INTO videos (title, description, video_url, duration, views)
    VALUES ($1, $2, $3, $4, $5)
    ON CONFLICT (video_url) DO UPDATE SET
      title = EXCLUDED.title,
      description = EXCLUDED.description,
      duration = EXCLUDED.duration,
      views = EXCLUDED.views;
    `,
    [row.title, row.description, row.videoUrl, row.duration, row.views]
  );
}
