import { z } from 'zod';
import type { BaseLogger } from 'pino';
import { COLLECTIONS, FALLBACK_LABELS } from '../config/search/constants';
import type { ContentRepository } from '../repositories/contentRepository';
import type { PublicUrlResolver } from './storageUrl';
import type { ImageCandidate, PageRef, RawRecord, TextCandidate, VideoCandidate } from '../types';

// Rows come straight from the database; every field is optional and may be null.
const optionalString = z
  .unknown()
  .transform((v) => (v === null || v === undefined ? undefined : String(v)));

const pageRef = z.unknown().transform((v): PageRef | undefined => {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isInteger(n) ? n : v;
  }
  return undefined;
});

const viewCount = z.unknown().transform((v) => {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? Number(v) : NaN;
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
});

const textRowSchema = z.object({
  source_file: optionalString,
  page: pageRef,
  content: optionalString
});

const imageRowSchema = z.object({
  source_file: optionalString,
  page: pageRef,
  image_path: optionalString,
  description: optionalString
});

const videoRowSchema = z.object({
  title: optionalString,
  description: optionalString,
  video_url: optionalString,
  duration: optionalString,
  views: viewCount
});

export function toTextCandidate(row: RawRecord): TextCandidate | null {
  const parsed = textRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const content = parsed.data.content ?? '';
  return {
    type: 'text',
    source: parsed.data.source_file ?? FALLBACK_LABELS.source,
    page: parsed.data.page ?? FALLBACK_LABELS.page,
    content,
    searchableText: content
  };
}

export function fallbackImageDescription(source: string | undefined, page: PageRef | undefined): string {
  return `Image from ${source ?? FALLBACK_LABELS.imageSource} page ${page ?? ''}`;
}

/** Returns null when the row has no stored object or its URL cannot be built. */
export function toImageCandidate(row: RawRecord, resolveUrl: PublicUrlResolver): ImageCandidate | null {
  const parsed = imageRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const { source_file, page, image_path, description } = parsed.data;
  if (!image_path) return null;
  const imageUrl = resolveUrl(image_path);
  if (!imageUrl) return null;

  // A stored empty description stays empty; only a missing one is synthesized.
  const caption = description ?? fallbackImageDescription(source_file, page);
  return {
    type: 'image',
    source: source_file ?? FALLBACK_LABELS.source,
    page: page ?? FALLBACK_LABELS.page,
    description: caption,
    imageUrl,
    searchableText: caption
  };
}

export function toVideoCandidate(row: RawRecord): VideoCandidate | null {
  const parsed = videoRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const title = parsed.data.title ?? '';
  const description = parsed.data.description ?? '';
  const videoUrl = parsed.data.video_url ?? '';
  return {
    type: 'video',
    source: videoUrl,
    title,
    description,
    videoUrl,
    duration: parsed.data.duration ?? '',
    views: parsed.data.views,
    searchableText: `${title} ${description}`
  };
}

/**
 * Translates raw repository rows into typed candidates. Repository errors
 * propagate to the caller; malformed rows are skipped with a warning.
 */
export class CandidateProvider {
  constructor(
    private readonly repository: ContentRepository,
    private readonly resolveUrl: PublicUrlResolver
  ) {}

  async fetchTexts(log: BaseLogger): Promise<TextCandidate[]> {
    const rows = await this.repository.fetchAll(COLLECTIONS.text);
    const candidates: TextCandidate[] = [];
    for (const row of rows) {
      const candidate = toTextCandidate(row);
      if (candidate) candidates.push(candidate);
      else log.warn({ id: row.id }, 'Skipping malformed text row');
    }
    return candidates;
  }

  async fetchImages(log: BaseLogger): Promise<ImageCandidate[]> {
    const rows = await this.repository.fetchAll(COLLECTIONS.image);
    const candidates: ImageCandidate[] = [];
    for (const row of rows) {
      const candidate = toImageCandidate(row, this.resolveUrl);
      if (candidate) candidates.push(candidate);
      else log.warn({ id: row.id, imagePath: row.image_path }, 'Skipping image without a resolvable path');
    }
    return candidates;
  }

  async fetchVideos(log: BaseLogger): Promise<VideoCandidate[]> {
    const rows = await this.repository.fetchAll(COLLECTIONS.video);
    const candidates: VideoCandidate[] = [];
    for (const row of rows) {
      const candidate = toVideoCandidate(row);
      if (candidate) candidates.push(candidate);
      else log.warn({ id: row.id }, 'Skipping malformed video row');
    }
    return candidates;
  }
}
