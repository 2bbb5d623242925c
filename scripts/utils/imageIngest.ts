import type { BaseLogger } from 'pino';
import { IMAGE_INGEST } from '../../src/config/ingest/constants';
import { contentTypeFor, normalizeExtension, type ExtractedImageFile } from './imageFiles';
import type { ImageRow } from './ingestDb';

export interface ImageIngestDeps {
  sourceFile: string;
  readImage(fileName: string): Promise<Buffer>;
  describe(content: Buffer): Promise<string | null>;
  upload(objectPath: string, content: Buffer, contentType: string): Promise<void>;
  publicUrl(objectPath: string): string;
  insert(row: ImageRow): Promise<void>;
  pause(): Promise<void>;
  log: BaseLogger;
}

export function objectPathFor(sourceFile: string, image: ExtractedImageFile): string {
  const format = normalizeExtension(image.ext);
  return `${IMAGE_INGEST.uploadPrefix}/${sourceFile}_p${image.pageIndex}_i${image.imageIndex}.${format}`;
}

/**
 * Labels, uploads and records each extracted image. A failing image is logged
 * and skipped. Returns the number of images stored.
 */
export async function ingestImages(images: ExtractedImageFile[], deps: ImageIngestDeps): Promise<number> {
  const { sourceFile, log } = deps;
  let stored = 0;
  for (const image of images) {
    const page = image.pageIndex + 1;
    try {
      const content = await deps.readImage(image.fileName);
      await deps.pause();
      const description = (await deps.describe(content)) ?? `Image from ${sourceFile} on page ${page}`;

      const format = normalizeExtension(image.ext);
      const imagePath = objectPathFor(sourceFile, image);
      await deps.upload(imagePath, content, contentTypeFor(format));
      await deps.insert({
        sourceFile,
        page,
        imageIndex: image.imageIndex,
        imagePath,
        publicUrl: deps.publicUrl(imagePath),
        description,
        format
      });
      stored += 1;
      log.info({ page, imageIndex: image.imageIndex }, 'Processed image');
    } catch (err) {
      log.error({ err, page, imageIndex: image.imageIndex }, 'Error processing image');
    }
  }
  return stored;
}
